import type { DeviggedOutcome, MarketType, Outcome } from "./sports/types";
import {
  DEFAULT_TOTALS_THRESHOLD,
  MARKET_KEYWORDS,
  MAX_REFERENCE_OVERROUND,
  MIN_REFERENCE_OVERROUND,
} from "./sports/config";

// =============================================
// ODDS CONVERSION
// =============================================

export function impliedProbability(decimalOdds: number): number {
  if (decimalOdds <= 0) return 0;
  return 1 / decimalOdds;
}

/**
 * Remove bookmaker margin by normalizing implied probabilities to sum to 1.
 * A zero total (no usable odds) yields the outcomes unchanged with
 * fairProb 0, which callers treat as unusable.
 */
export function devig(outcomes: Outcome[]): DeviggedOutcome[] {
  const implied = outcomes.map((o) => impliedProbability(o.odds));
  const total = implied.reduce((sum, p) => sum + p, 0);

  if (total === 0) {
    return outcomes.map((o) => ({ ...o, impliedProb: 0, fairProb: 0 }));
  }

  return outcomes.map((o, i) => {
    const impliedProb = implied[i] ?? 0;
    return { ...o, impliedProb, fairProb: impliedProb / total };
  });
}

export function isDevigged(outcomes: DeviggedOutcome[]): boolean {
  return outcomes.some((o) => o.fairProb > 0);
}

/**
 * Sum of implied probabilities (1.0 = no margin)
 */
export function overround(outcomes: Outcome[]): number {
  return outcomes
    .filter((o) => o.odds > 1)
    .reduce((sum, o) => sum + 1 / o.odds, 0);
}

export function isPlausibleMargin(outcomes: Outcome[]): boolean {
  const total = overround(outcomes);
  return total >= MIN_REFERENCE_OVERROUND && total <= MAX_REFERENCE_OVERROUND;
}

/**
 * EV% = (true probability x odds - 1) x 100, rounded to 2 decimals
 */
export function calculateEv(decimalOdds: number, fairProb: number): number {
  return round((fairProb * decimalOdds - 1) * 100, 2);
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

// =============================================
// MARKET DETECTION
// =============================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * True when `keyword` occurs in `label` as whole words: an edge of the
 * keyword that is a letter may not touch another letter ("over" is not
 * found in "hannover"). Both sides are expected lowercase.
 */
export function hasKeyword(label: string, keyword: string): boolean {
  const start = /^\p{L}/u.test(keyword) ? "(?<!\\p{L})" : "";
  const end = /\p{L}$/u.test(keyword) ? "(?!\\p{L})" : "";
  return new RegExp(`${start}${escapeRegExp(keyword)}${end}`, "u").test(label);
}

/**
 * Classify an unlabeled market from its outcome labels.
 * Over/under wins over BTTS; otherwise outcome count decides.
 */
export function detectMarketType(outcomes: Outcome[]): { marketType: MarketType; threshold?: number } {
  if (outcomes.length === 0) {
    return { marketType: "unknown" };
  }

  const joined = outcomes.map((o) => o.name.toLowerCase()).join(" ");

  if (MARKET_KEYWORDS.totalsMarket.some((kw) => hasKeyword(joined, kw))) {
    const line = joined.match(/(\d+[.,]\d+)/);
    const threshold = line?.[1] ? Number(line[1].replace(",", ".")) : DEFAULT_TOTALS_THRESHOLD;
    return { marketType: "over_under", threshold };
  }

  if (MARKET_KEYWORDS.bttsMarket.some((kw) => hasKeyword(joined, kw))) {
    return { marketType: "btts" };
  }

  if (outcomes.length === 3) return { marketType: "h2h" };
  if (outcomes.length === 2) return { marketType: "h2h_2way" };

  return { marketType: "unknown" };
}
