import type { LedgerBackend } from "./db/repositories/ledger.repo";
import { DEFAULT_BANKROLL_CONFIG } from "./services/sports/config";
import type { BankrollConfig, MarketFilter } from "./services/sports/types";

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : Number.NaN;
}

function backendEnv(): LedgerBackend {
  return process.env.LEDGER_BACKEND === "file" ? "file" : "sqlite";
}

function marketFilterEnv(): MarketFilter {
  const raw = process.env.MARKET_FILTER;
  if (raw === "h2h" || raw === "over_under" || raw === "btts") return raw;
  return "all";
}

export const config = {
  // Storage
  DB_PATH: process.env.DB_PATH || "./data/ev-ledger.db",
  LEDGER_BACKEND: backendEnv(),
  LEDGER_FILE: process.env.LEDGER_FILE || "./data/bankroll.json",

  // Bankroll & staking
  BANKROLL_INITIAL: numberEnv("BANKROLL_INITIAL", DEFAULT_BANKROLL_CONFIG.initialBankroll),
  KELLY_FRACTION: numberEnv("KELLY_FRACTION", DEFAULT_BANKROLL_CONFIG.kellyMultiplier), // 0.25 = quarter Kelly
  MAX_STAKE_PERCENT: numberEnv("MAX_STAKE_PERCENT", DEFAULT_BANKROLL_CONFIG.maxStakePercent),
  MIN_STAKE: numberEnv("MIN_STAKE", DEFAULT_BANKROLL_CONFIG.minStake),
  MIN_EV_TO_BET: numberEnv("MIN_EV_TO_BET", DEFAULT_BANKROLL_CONFIG.minEvToBet),
  MIN_BOOKS_TO_BET: numberEnv("MIN_BOOKS_TO_BET", DEFAULT_BANKROLL_CONFIG.minBooksToBet),
  AUTO_BET: process.env.AUTO_BET !== "false",

  // Detection
  MIN_EV_THRESHOLD: numberEnv("MIN_EV_THRESHOLD", 0),
  MARKET_FILTER: marketFilterEnv(),
  CACHE_DURATION: numberEnv("CACHE_DURATION", 120), // seconds

  // Snapshot sources
  TARGET_EVENTS_FILE: process.env.TARGET_EVENTS_FILE || "./data/target-events.json",
  REFERENCE_EVENTS_DIR: process.env.REFERENCE_EVENTS_DIR || "./data/reference",
  RESULTS_FILE: process.env.RESULTS_FILE || "./data/results.json",
};

export function bankrollConfig(): BankrollConfig {
  return {
    initialBankroll: config.BANKROLL_INITIAL,
    kellyMultiplier: config.KELLY_FRACTION,
    maxStakePercent: config.MAX_STAKE_PERCENT,
    minStake: config.MIN_STAKE,
    minEvToBet: config.MIN_EV_TO_BET,
    minBooksToBet: config.MIN_BOOKS_TO_BET,
    autoBet: config.AUTO_BET,
  };
}

export function validateConfig(): { valid: boolean; invalid: string[] } {
  const invalid: string[] = [];

  if (!(config.BANKROLL_INITIAL > 0)) {
    invalid.push("BANKROLL_INITIAL (must be > 0)");
  }
  if (!(config.KELLY_FRACTION > 0 && config.KELLY_FRACTION <= 1)) {
    invalid.push("KELLY_FRACTION (must be in (0, 1])");
  }
  if (!(config.MAX_STAKE_PERCENT > 0 && config.MAX_STAKE_PERCENT <= 1)) {
    invalid.push("MAX_STAKE_PERCENT (must be in (0, 1])");
  }
  if (!(config.MIN_STAKE >= 0)) {
    invalid.push("MIN_STAKE (must be >= 0)");
  }
  if (Number.isNaN(config.MIN_EV_TO_BET)) {
    invalid.push("MIN_EV_TO_BET (must be a number)");
  }
  if (!(config.MIN_BOOKS_TO_BET >= 1)) {
    invalid.push("MIN_BOOKS_TO_BET (must be >= 1)");
  }
  if (Number.isNaN(config.MIN_EV_THRESHOLD)) {
    invalid.push("MIN_EV_THRESHOLD (must be a number)");
  }
  if (!(config.CACHE_DURATION >= 0)) {
    invalid.push("CACHE_DURATION (must be >= 0)");
  }

  return { valid: invalid.length === 0, invalid };
}
