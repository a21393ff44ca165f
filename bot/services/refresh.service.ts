import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import type { Ledger } from "./ledger.service";
import { defaultSimilarity, type StringSimilarity } from "./matcher.service";
import { isPlausibleMargin, round } from "./odds.service";
import { settleBets } from "./settlement.service";
import { REFRESH_LOG_LIMIT } from "./sports/config";
import type {
  MarketEvent,
  MarketFilter,
  OddsSource,
  RefreshLogEntry,
  RefreshSnapshot,
  RefreshStats,
  RefreshStatus,
  ResultResolver,
  ValueBet,
} from "./sports/types";
import { dedupeValueBets, detectValueBets, sortByEv } from "./value.service";

// =============================================
// REFRESH STATE
// =============================================

/**
 * Progress of the running refresh and output of the last successful one.
 * One refresh runs at a time: `tryBegin` flips the status to loading and
 * refuses while it already is. Cached results are only replaced on success.
 */
export class RefreshState {
  private status: RefreshStatus = "idle";
  private error: string | null = null;
  private logs: RefreshLogEntry[] = [];
  private progress = 0;
  private lastUpdate = 0;
  private valueBets: ValueBet[] = [];
  private targetEvents: MarketEvent[] = [];
  private stats: RefreshStats | null = null;

  tryBegin(): boolean {
    if (this.status === "loading") return false;

    this.status = "loading";
    this.error = null;
    this.logs = [];
    this.progress = 0;
    return true;
  }

  log(msg: string): void {
    this.logs.push({ time: Date.now(), msg });
    if (this.logs.length > REFRESH_LOG_LIMIT) {
      this.logs = this.logs.slice(-REFRESH_LOG_LIMIT);
    }
    logger.info(msg);
  }

  setProgress(progress: number): void {
    this.progress = progress;
  }

  complete(targetEvents: MarketEvent[], valueBets: ValueBet[], stats: RefreshStats): void {
    this.targetEvents = targetEvents;
    this.valueBets = valueBets;
    this.stats = stats;
    this.status = "ready";
    this.progress = 100;
    this.lastUpdate = Date.now();
  }

  fail(message: string): void {
    this.status = "error";
    this.error = message;
    this.log(`Error: ${message}`);
  }

  snapshot(): RefreshSnapshot {
    return {
      status: this.status,
      error: this.error,
      logs: this.logs.map((entry) => ({ ...entry })),
      progress: this.progress,
      lastUpdate: this.lastUpdate,
      valueBets: [...this.valueBets],
      targetEvents: [...this.targetEvents],
      stats: this.stats ? { ...this.stats, bySport: { ...this.stats.bySport } } : null,
    };
  }
}

// Process-wide refresh state
export const refreshState = new RefreshState();

/**
 * True when the cached value bets are older than `cacheSeconds` (or absent)
 */
export function isStale(snapshot: RefreshSnapshot, cacheSeconds: number, nowMs: number = Date.now()): boolean {
  if (snapshot.lastUpdate === 0) return true;
  return nowMs - snapshot.lastUpdate > cacheSeconds * 1000;
}

// =============================================
// STATS & FILTERS
// =============================================

export function computeStats(valueBets: ValueBet[], totalEvents: number): RefreshStats {
  const bySport: Record<string, number> = {};
  for (const bet of valueBets) {
    bySport[bet.sport] = (bySport[bet.sport] ?? 0) + 1;
  }

  let topSport = "-";
  let topCount = 0;
  for (const [sport, count] of Object.entries(bySport)) {
    if (count > topCount) {
      topSport = sport;
      topCount = count;
    }
  }

  const avgEv =
    valueBets.length > 0 ? round(valueBets.reduce((sum, b) => sum + b.evPercent, 0) / valueBets.length, 2) : 0;

  return { totalBets: valueBets.length, totalEvents, avgEv, bySport, topSport };
}

export interface ValueBetFilter {
  sport?: string; // "all" or absent = every sport
  minEv?: number;
  minOdds?: number;
  maxOdds?: number;
}

export function filterValueBets(bets: ValueBet[], filter: ValueBetFilter = {}): ValueBet[] {
  return bets.filter((bet) => {
    if (filter.sport && filter.sport !== "all" && bet.sport !== filter.sport) return false;
    if (filter.minEv !== undefined && bet.evPercent < filter.minEv) return false;
    if (filter.minOdds !== undefined && bet.targetOdds < filter.minOdds) return false;
    if (filter.maxOdds !== undefined && bet.targetOdds > filter.maxOdds) return false;
    return true;
  });
}

// =============================================
// REFRESH PIPELINE
// =============================================

export interface RefreshOptions {
  ledger: Ledger;
  odds: OddsSource;
  resolve?: ResultResolver; // omitted = skip settlement
  state?: RefreshState;
  minEv?: number;
  marketFilter?: MarketFilter;
  similarity?: StringSimilarity;
}

export interface RefreshOutcome {
  started: boolean; // false when another refresh was already running
  snapshot: RefreshSnapshot;
}

function groupBySport(events: MarketEvent[]): Map<string, MarketEvent[]> {
  const groups = new Map<string, MarketEvent[]>();
  for (const event of events) {
    const key = event.sportKey ?? event.sport;
    const group = groups.get(key);
    if (group) {
      group.push(event);
    } else {
      groups.set(key, [event]);
    }
  }
  return groups;
}

/**
 * Fetch odds, detect value bets per sport, settle what has finished and
 * place what qualifies. A failing sport, settlement or placement is logged
 * and the run carries on; any other failure marks the state as errored.
 */
export async function runRefresh(options: RefreshOptions): Promise<RefreshOutcome> {
  const state = options.state ?? refreshState;
  const minEv = options.minEv ?? 0;
  const marketFilter = options.marketFilter ?? "all";
  const similarity = options.similarity ?? defaultSimilarity;

  if (!state.tryBegin()) {
    logger.warn("Refresh already in progress");
    return { started: false, snapshot: state.snapshot() };
  }

  try {
    state.setProgress(10);
    state.log("Fetching target events...");
    const targetEvents = await options.odds.fetchTargetEvents();
    state.log(`${targetEvents.length} target events`);
    state.setProgress(25);

    const bySport = groupBySport(targetEvents);
    const found: ValueBet[] = [];
    let done = 0;

    for (const [sportKey, events] of bySport) {
      try {
        const references = await options.odds.fetchReferenceEvents(sportKey, marketFilter);
        const usable = references.filter((ref) => isPlausibleMargin(ref.outcomes));
        if (usable.length < references.length) {
          state.log(`${sportKey}: dropped ${references.length - usable.length} references with implausible margin`);
        }

        const valueBets = detectValueBets(events, usable, minEv, similarity);
        state.log(`${sportKey}: ${events.length} events, ${usable.length} references, ${valueBets.length} value bets`);
        found.push(...valueBets);
      } catch (error) {
        logger.error(`Failed to process ${sportKey}`, error);
        state.log(`${sportKey}: skipped (${errorMessage(error)})`);
      }

      done++;
      state.setProgress(25 + Math.round((55 * done) / bySport.size));
    }

    const valueBets = dedupeValueBets(sortByEv(found));
    state.log(`${valueBets.length} value bets found`);
    state.setProgress(90);

    if (options.resolve) {
      try {
        const settlement = await settleBets(options.ledger, options.resolve);
        if (settlement.settled > 0) {
          state.log(`Settled ${settlement.settled} bets (${settlement.stillPending} still pending)`);
        }
      } catch (error) {
        logger.error("Settlement failed", error);
        state.log(`Settlement failed: ${errorMessage(error)}`);
      }
    }
    state.setProgress(92);

    try {
      const placement = options.ledger.placeBets(valueBets);
      if (placement.placed > 0) {
        state.log(`Placed ${placement.placed} bets`);
      }
    } catch (error) {
      logger.error("Bet placement failed", error);
      state.log(`Bet placement failed: ${errorMessage(error)}`);
    }
    state.setProgress(95);

    const stats = computeStats(valueBets, targetEvents.length);
    state.complete(targetEvents, valueBets, stats);
    state.log(`Refresh complete: ${stats.totalBets} value bets, avg EV ${stats.avgEv.toFixed(2)}%`);
  } catch (error) {
    logger.error("Refresh failed", error);
    state.fail(errorMessage(error));
  }

  return { started: true, snapshot: state.snapshot() };
}
