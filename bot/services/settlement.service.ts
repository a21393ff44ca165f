import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { nowSeconds } from "../utils/time";
import { applyOutcome, type Ledger } from "./ledger.service";
import { defaultSimilarity, normalizeTeamName, type StringSimilarity } from "./matcher.service";
import { IN_PROGRESS_WINDOW_SECONDS, WINNER_MATCH_THRESHOLD } from "./sports/config";
import type {
  Bet,
  BetReport,
  BetReportReason,
  MatchResult,
  ResultResolver,
  SettledStatus,
  SettlementResult,
} from "./sports/types";
import { classifyBttsSide, classifyTotalsSide, isDrawName } from "./value.service";

// =============================================
// RESULT INTERPRETATION
// =============================================

/**
 * "2-1", "2:1", "2 - 1" and "2 1" all read as [2, 1]
 */
export function parseScore(score: string): [number, number] | null {
  const match = score.match(/(\d+)\s*(?:[-:]|\s)\s*(\d+)/);
  if (!match?.[1] || !match[2]) return null;
  return [Number(match[1]), Number(match[2])];
}

export function winnerMatches(
  betOn: string,
  winners: string[],
  similarity: StringSimilarity = defaultSimilarity
): boolean {
  if (isDrawName(betOn)) {
    return winners.some(isDrawName);
  }

  const selection = normalizeTeamName(betOn);
  return winners.some((winner) => {
    const name = normalizeTeamName(winner);
    return name === selection || similarity.similarity(selection, name) >= WINNER_MATCH_THRESHOLD;
  });
}

/**
 * Did the bet win? null when the result does not decide it
 * (no winners reported, unreadable score, unknown side or line).
 */
export function checkWin(
  bet: Pick<Bet, "marketType" | "betOn" | "threshold">,
  result: MatchResult,
  similarity: StringSimilarity = defaultSimilarity
): boolean | null {
  switch (bet.marketType) {
    case "h2h":
    case "h2h_2way":
      if (result.winningOutcomes.length === 0) return null;
      return winnerMatches(bet.betOn, result.winningOutcomes, similarity);

    case "over_under": {
      const goals = parseScore(result.score);
      const side = classifyTotalsSide(bet.betOn);
      if (!goals || !side || bet.threshold === undefined) return null;
      const total = goals[0] + goals[1];
      return side === "over" ? total > bet.threshold : total <= bet.threshold;
    }

    case "btts": {
      const goals = parseScore(result.score);
      const side = classifyBttsSide(bet.betOn);
      if (!goals || !side) return null;
      const bothScored = goals[0] > 0 && goals[1] > 0;
      return bothScored === (side === "yes");
    }

    case "unknown":
      return null;
  }
}

// =============================================
// SETTLEMENT
// =============================================

export interface SettleOptions {
  force?: boolean; // include a report line for every pending bet
  now?: number;
  similarity?: StringSimilarity;
}

interface Decision {
  betId: string;
  outcome: SettledStatus;
  resultInfo: string;
}

function describe(bet: Bet): Pick<BetReport, "betId" | "match" | "betOn"> {
  return { betId: bet.betId, match: `${bet.home} vs ${bet.away}`, betOn: bet.betOn };
}

function formatMinutes(seconds: number): string {
  const mins = Math.round(seconds / 60);
  return mins >= 60 ? `${Math.floor(mins / 60)}h${mins % 60}m` : `${mins}m`;
}

/**
 * Look up the outcome of one pending bet. Returns either a settlement
 * decision or the reason it stays pending.
 */
async function evaluate(
  bet: Bet,
  resolve: ResultResolver,
  now: number,
  similarity: StringSimilarity
): Promise<Decision | { reason: BetReportReason; message: string }> {
  if (bet.startTime > 0) {
    if (bet.startTime > now) {
      return { reason: "not_started", message: `Starts in ${formatMinutes(bet.startTime - now)}` };
    }
    if (now - bet.startTime < IN_PROGRESS_WINDOW_SECONDS) {
      return { reason: "in_progress", message: `Started ${formatMinutes(now - bet.startTime)} ago` };
    }
  }

  let result: MatchResult | null;
  try {
    result = await resolve(bet.matchId, bet.home, bet.away, bet.startTime, bet.sport);
  } catch (error) {
    logger.error(`Result lookup failed for ${bet.home} vs ${bet.away}`, error);
    return { reason: "error", message: `Lookup failed: ${errorMessage(error)}` };
  }

  if (!result) {
    return { reason: "no_result", message: "No result available yet" };
  }

  if (result.status === "live") {
    return { reason: "in_progress", message: `Live (${result.score || "no score"})` };
  }

  if (result.status === "cancelled") {
    return { betId: bet.betId, outcome: "void", resultInfo: result.score || "cancelled" };
  }

  const won = checkWin(bet, result, similarity);
  if (won === null) {
    return { reason: "no_result", message: `Result does not decide the bet (${result.score || "no score"})` };
  }

  return { betId: bet.betId, outcome: won ? "won" : "lost", resultInfo: result.score };
}

function settledMessage(bet: Bet): string {
  const profit = bet.profit ?? 0;
  switch (bet.status) {
    case "won":
      return `WON +${profit.toFixed(2)} (${bet.resultInfo ?? ""})`;
    case "lost":
      return `LOST ${profit.toFixed(2)} (${bet.resultInfo ?? ""})`;
    default:
      return `VOID, stake ${bet.stake.toFixed(2)} refunded`;
  }
}

/**
 * Settle pending bets whose result is known. Lookups run outside the
 * ledger's critical section; decisions are then applied in one mutation
 * to the bets that are still pending, so no bet is settled twice.
 */
export async function settleBets(
  ledger: Ledger,
  resolve: ResultResolver,
  options: SettleOptions = {}
): Promise<SettlementResult> {
  const now = options.now ?? nowSeconds();
  const similarity = options.similarity ?? defaultSimilarity;
  const pending = ledger.read().bets.filter((b) => b.status === "pending");

  if (pending.length === 0) {
    return { settled: 0, stillPending: 0, details: [], betReports: [] };
  }

  const decisions: Decision[] = [];
  const reports = new Map<string, BetReport>();

  for (const bet of pending) {
    const verdict = await evaluate(bet, resolve, now, similarity);
    if ("outcome" in verdict) {
      decisions.push(verdict);
    } else {
      reports.set(bet.betId, { ...describe(bet), reason: verdict.reason, message: verdict.message });
    }
  }

  const pendingIds = new Set(pending.map((b) => b.betId));
  const { details, stillPending } = ledger.mutate((current) => {
    const applied: Bet[] = [];

    for (const decision of decisions) {
      const bet = current.bets.find((b) => b.betId === decision.betId);
      if (!bet) continue;

      if (!applyOutcome(current, bet, decision.outcome, decision.resultInfo, now)) {
        reports.set(bet.betId, {
          ...describe(bet),
          reason: "already_settled",
          message: `Already settled (${bet.status})`,
        });
        continue;
      }

      if (decision.outcome === "won") {
        logger.success(`Bet WON: ${bet.betOn} (${bet.home} vs ${bet.away}) - profit: ${(bet.profit ?? 0).toFixed(2)}`);
      } else if (decision.outcome === "lost") {
        logger.info(`Bet LOST: ${bet.betOn} (${bet.home} vs ${bet.away}) - loss: ${bet.stake.toFixed(2)}`);
      } else {
        logger.info(`Bet VOID: ${bet.betOn} (${bet.home} vs ${bet.away}) - stake refunded`);
      }

      reports.set(bet.betId, { ...describe(bet), reason: decision.outcome, message: settledMessage(bet) });
      applied.push({ ...bet });
    }

    // Counted after applying, so bets settled or reset meanwhile drop out
    const remaining = current.bets.filter((b) => pendingIds.has(b.betId) && b.status === "pending").length;
    return { result: { details: applied, stillPending: remaining }, dirty: applied.length > 0 };
  });

  if (details.length > 0) {
    logger.info(`Settlement check: ${pending.length} pending bets, ${details.length} settled`);
  }

  const betReports: BetReport[] = [];
  if (options.force) {
    for (const bet of pending) {
      const report = reports.get(bet.betId);
      if (report) betReports.push(report);
    }
  }

  return {
    settled: details.length,
    stillPending,
    details,
    betReports,
  };
}
