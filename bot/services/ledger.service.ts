import { randomUUID } from "crypto";
import type { LedgerStore } from "../db/repositories/ledger.repo";
import { logger } from "../utils/logger";
import { nowSeconds } from "../utils/time";
import { round } from "./odds.service";
import { DEFAULT_BANKROLL_CONFIG, RECENT_BETS_LIMIT } from "./sports/config";
import type {
  BankrollConfig,
  BankrollLedger,
  BankrollSummary,
  Bet,
  KellySizing,
  ManualSettlementResult,
  PlacementResult,
  PlPoint,
  SettledStatus,
  ValueBet,
} from "./sports/types";

// =============================================
// KELLY SIZING
// =============================================

/**
 * Fractional Kelly: f = (bp - q) / b, scaled by the multiplier and capped.
 * Stakes under the minimum are dropped to 0.
 */
export function kellyStake(
  odds: number,
  fairProbPct: number,
  bankroll: number,
  config: BankrollConfig = DEFAULT_BANKROLL_CONFIG
): KellySizing {
  const p = fairProbPct / 100;
  const q = 1 - p;
  const b = odds - 1;
  const none: KellySizing = { kellyFull: 0, kellyFraction: 0, stake: 0, kellyUsed: config.kellyMultiplier };

  if (!Number.isFinite(odds) || !Number.isFinite(fairProbPct) || !Number.isFinite(bankroll)) return none;
  if (b <= 0 || p <= 0) return none;

  const kellyFull = (b * p - q) / b;
  if (kellyFull <= 0) return none;

  const kellyFraction = Math.min(kellyFull * config.kellyMultiplier, config.maxStakePercent);
  let stake = round(bankroll * kellyFraction, 2);
  if (stake < config.minStake) stake = 0;

  return {
    kellyFull: round(kellyFull, 6),
    kellyFraction: round(kellyFraction, 6),
    stake,
    kellyUsed: config.kellyMultiplier,
  };
}

// =============================================
// LEDGER STATE
// =============================================

export function freshLedger(initialBankroll: number, now: number = nowSeconds()): BankrollLedger {
  return {
    initialBankroll,
    currentBankroll: initialBankroll,
    totalStaked: 0,
    totalReturned: 0,
    createdAt: now,
    lastUpdated: now,
    bets: [],
  };
}

export function placementKey(bet: Pick<ValueBet, "matchId" | "betOn" | "market">): string {
  return JSON.stringify([bet.matchId, bet.betOn, bet.market]);
}

/**
 * Move a pending bet to a terminal state and credit the bankroll:
 * won pays stake x odds, void refunds the stake, lost pays nothing.
 * Returns false (and changes nothing) if the bet is already settled.
 */
export function applyOutcome(
  ledger: BankrollLedger,
  bet: Bet,
  outcome: SettledStatus,
  resultInfo: string,
  now: number = nowSeconds()
): boolean {
  if (bet.status !== "pending") return false;

  switch (outcome) {
    case "won": {
      const payout = round(bet.stake * bet.targetOdds, 2);
      bet.profit = round(payout - bet.stake, 2);
      ledger.currentBankroll = round(ledger.currentBankroll + payout, 2);
      ledger.totalReturned = round(ledger.totalReturned + payout, 2);
      break;
    }
    case "lost":
      bet.profit = round(-bet.stake, 2);
      break;
    case "void":
      bet.profit = 0;
      ledger.currentBankroll = round(ledger.currentBankroll + bet.stake, 2);
      break;
  }

  bet.status = outcome;
  bet.settledAt = now;
  bet.resultInfo = resultInfo;
  return true;
}

// =============================================
// SUMMARY
// =============================================

export function summarize(ledger: BankrollLedger, recentLimit: number = RECENT_BETS_LIMIT): BankrollSummary {
  const bets = ledger.bets;
  const pending = bets.filter((b) => b.status === "pending");
  const won = bets.filter((b) => b.status === "won");
  const lost = bets.filter((b) => b.status === "lost");
  const voided = bets.filter((b) => b.status === "void");
  const settled = [...won, ...lost];

  const totalProfit = settled.reduce((sum, b) => sum + (b.profit ?? 0), 0);
  const settledStakes = settled.reduce((sum, b) => sum + b.stake, 0);
  const winRate = settled.length > 0 ? (won.length / settled.length) * 100 : 0;
  const roi = settledStakes > 0 ? (totalProfit / settledStakes) * 100 : 0;

  const plHistory: PlPoint[] = [];
  let cumulative = 0;
  for (const bet of [...settled].sort((a, b) => (a.settledAt ?? 0) - (b.settledAt ?? 0))) {
    cumulative += bet.profit ?? 0;
    plHistory.push({
      timestamp: bet.settledAt ?? 0,
      cumulativePl: round(cumulative, 2),
      bankroll: round(ledger.initialBankroll + cumulative, 2),
      betId: bet.betId,
    });
  }

  // Newest first; same-second bets by descending ledger position
  const recentBets = bets
    .map((bet, position) => ({ bet, position }))
    .sort((a, b) => b.bet.placedAt - a.bet.placedAt || b.position - a.position)
    .slice(0, recentLimit)
    .map(({ bet }) => bet);

  return {
    initialBankroll: ledger.initialBankroll,
    currentBankroll: ledger.currentBankroll,
    totalStaked: ledger.totalStaked,
    totalReturned: round(ledger.totalReturned, 2),
    totalProfit: round(totalProfit, 2),
    totalBets: bets.length,
    pendingBets: pending.length,
    wonBets: won.length,
    lostBets: lost.length,
    voidBets: voided.length,
    winRate: round(winRate, 1),
    roi: round(roi, 1),
    plHistory,
    recentBets,
    createdAt: ledger.createdAt,
  };
}

// =============================================
// LEDGER
// =============================================

export interface Mutation<T> {
  result: T;
  dirty: boolean; // false = nothing to persist
}

function isSettledStatus(value: string): value is SettledStatus {
  return value === "won" || value === "lost" || value === "void";
}

function newBetId(taken: Set<string>): string {
  let id = randomUUID().replace(/-/g, "").slice(0, 12);
  while (taken.has(id)) {
    id = randomUUID().replace(/-/g, "").slice(0, 12);
  }
  return id;
}

/**
 * Virtual bankroll and its bets. Every read-modify-write goes through
 * `mutate`, whose body runs synchronously from load to durable save, so no
 * two mutations of the same ledger interleave.
 */
export class Ledger {
  private mutating = false;

  constructor(
    private readonly store: LedgerStore,
    readonly config: BankrollConfig = DEFAULT_BANKROLL_CONFIG
  ) {}

  /**
   * Consistent snapshot of the whole ledger (one load)
   */
  read(): BankrollLedger {
    return this.store.load() ?? freshLedger(this.config.initialBankroll);
  }

  mutate<T>(fn: (ledger: BankrollLedger) => Mutation<T>): T {
    if (this.mutating) {
      throw new Error("Ledger mutation already in progress");
    }

    this.mutating = true;
    try {
      const ledger = this.read();
      const { result, dirty } = fn(ledger);
      if (dirty) {
        ledger.lastUpdated = nowSeconds();
        this.store.save(ledger);
      }
      return result;
    } finally {
      this.mutating = false;
    }
  }

  /**
   * Place the candidates that pass dedup, quality and sizing checks.
   * Stakes are sized against the bankroll as it runs down through the batch;
   * the batch is persisted once.
   */
  placeBets(candidates: ValueBet[]): PlacementResult {
    const config = this.config;

    if (!config.autoBet) {
      return { placed: 0, skipped: candidates.length, details: [] };
    }

    return this.mutate((ledger) => {
      const existingKeys = new Set(ledger.bets.map(placementKey));
      const betIds = new Set(ledger.bets.map((b) => b.betId));
      const placed: Bet[] = [];
      let skipped = 0;

      for (const candidate of candidates) {
        try {
          if (!candidate.matchId || !Number.isFinite(candidate.evPercent) || !Number.isFinite(candidate.numBooks)) {
            skipped++;
            continue;
          }

          const key = placementKey(candidate);
          if (existingKeys.has(key)) {
            skipped++;
            continue;
          }

          if (candidate.evPercent < config.minEvToBet || candidate.numBooks < config.minBooksToBet) {
            skipped++;
            continue;
          }

          const sizing = kellyStake(candidate.targetOdds, candidate.fairProbPct, ledger.currentBankroll, config);
          if (sizing.stake <= 0) {
            skipped++;
            continue;
          }

          const bet: Bet = {
            ...candidate,
            betId: newBetId(betIds),
            placedAt: nowSeconds(),
            stake: sizing.stake,
            kellyFraction: sizing.kellyFraction,
            kellyUsed: sizing.kellyUsed,
            potentialReturn: round(sizing.stake * candidate.targetOdds, 2),
            status: "pending",
            settledAt: null,
            profit: null,
            resultInfo: null,
          };

          ledger.bets.push(bet);
          ledger.currentBankroll = round(ledger.currentBankroll - sizing.stake, 2);
          ledger.totalStaked = round(ledger.totalStaked + sizing.stake, 2);
          existingKeys.add(key);
          betIds.add(bet.betId);
          placed.push(bet);
        } catch (error) {
          skipped++;
          logger.error(`Failed to evaluate ${candidate.home} vs ${candidate.away} (${candidate.betOn})`, error);
        }
      }

      if (placed.length > 0) {
        logger.success(`Placed ${placed.length} bets (${placed.reduce((s, b) => s + b.stake, 0).toFixed(2)} staked)`);
      }

      return { result: { placed: placed.length, skipped, details: placed }, dirty: true };
    });
  }

  /**
   * Settle a pending bet by hand with the same crediting rules as automatic settlement
   */
  settleManually(betId: string, outcome: string, score: string = ""): ManualSettlementResult {
    if (!isSettledStatus(outcome)) {
      return { success: false, message: `Invalid result: ${outcome}` };
    }

    const result = this.mutate((ledger): Mutation<ManualSettlementResult> => {
      const bet = ledger.bets.find((b) => b.betId === betId);

      if (!bet) {
        return { result: { success: false, message: `Bet ${betId} not found` }, dirty: false };
      }
      if (bet.status !== "pending") {
        return { result: { success: false, message: `Bet already settled (${bet.status})` }, dirty: false };
      }

      applyOutcome(ledger, bet, outcome, score || "manual");

      let message: string;
      if (outcome === "won") {
        message = `WON: +${(bet.profit ?? 0).toFixed(2)}`;
      } else if (outcome === "lost") {
        message = `LOST: ${(bet.profit ?? 0).toFixed(2)}`;
      } else {
        message = "VOID: stake refunded";
      }

      logger.info(`Manually settled ${bet.betId} (${bet.home} vs ${bet.away}): ${message}`);
      return { result: { success: true, message }, dirty: true };
    });

    if (!result.success) return result;
    return { ...result, summary: this.getSummary() };
  }

  getSummary(recentLimit: number = RECENT_BETS_LIMIT): BankrollSummary {
    return summarize(this.read(), recentLimit);
  }

  /**
   * Start over with an empty ledger
   */
  reset(initialAmount: number = this.config.initialBankroll): BankrollSummary {
    if (!Number.isFinite(initialAmount) || initialAmount <= 0) {
      throw new RangeError(`Initial bankroll must be positive, got ${initialAmount}`);
    }

    this.mutate((ledger) => {
      Object.assign(ledger, freshLedger(initialAmount));
      return { result: undefined, dirty: true };
    });

    logger.info(`Bankroll reset to ${initialAmount.toFixed(2)}`);
    return this.getSummary();
  }
}

