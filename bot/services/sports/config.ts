// =============================================
// VALUE BETTING CONFIG
// =============================================

import type { BankrollConfig } from "./types";

export const DEFAULT_BANKROLL_CONFIG: BankrollConfig = {
  initialBankroll: 100, // Starting virtual bankroll
  kellyMultiplier: 0.25, // Quarter Kelly
  maxStakePercent: 0.05, // 5% max per bet
  minStake: 0.1, // Below this the stake is dropped as dust
  minEvToBet: 1.0, // EV% required to place (detection may list lower)
  minBooksToBet: 3, // Consensus from 3+ books
  autoBet: true,
};

// Fuzzy thresholds
export const EVENT_MATCH_THRESHOLD = 0.55;
export const OUTCOME_MATCH_THRESHOLD = 0.5; // strict: similarity must exceed this
export const WINNER_MATCH_THRESHOLD = 0.85;

// EV at or above this is a matching/data error, not an edge
export const MAX_PLAUSIBLE_EV = 50;

// Totals line used when a source omits it
export const DEFAULT_TOTALS_THRESHOLD = 2.5;

// Reference overround bounds; outside them a soft book was likely captured
export const MIN_REFERENCE_OVERROUND = 0.97;
export const MAX_REFERENCE_OVERROUND = 1.06;

// Bets that started less than this long ago are treated as still being played
export const IN_PROGRESS_WINDOW_SECONDS = 2 * 60 * 60;

export const RECENT_BETS_LIMIT = 50;
export const REFRESH_LOG_LIMIT = 30;

// Tokens dropped from team names before comparison
export const CLUB_TOKENS = new Set(["fc", "ac", "sc", "as", "ss", "us", "rc", "utd", "afc", "cf"]);

// Outcome labels meaning "draw" across the sources we read
export const DRAW_NAMES = new Set(["draw", "nul", "match nul", "x", "tie"]);

// Keyword sets for side/market classification, matched as whole words
// (see hasKeyword). Checked in order.
export const MARKET_KEYWORDS = {
  over: ["plus", "over"],
  under: ["moins", "under"],
  yes: ["oui", "yes"],
  no: ["non", "no"],
  totalsMarket: ["plus de", "moins de", "over", "under", "+1.", "+2.", "+3.", "-1.", "-2.", "-3."],
  bttsMarket: ["deux equipes", "both teams", "btts", "les 2 equipes", "marquent"],
} as const;
