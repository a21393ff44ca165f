import type Database from "better-sqlite3";
import { existsSync, readFileSync, renameSync, rmSync, writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { getDb } from "../index";
import { LedgerReadError, LedgerWriteError, errorMessage } from "../../utils/errors";
import type { BankrollLedger, Bet, BetStatus, MarketType } from "../../services/sports/types";

/**
 * Durable home of the ledger. `save` must persist the whole ledger or
 * nothing; `load` returns null when nothing has been saved yet.
 */
export interface LedgerStore {
  load(): BankrollLedger | null;
  save(ledger: BankrollLedger): void;
}

// =============================================
// PERSISTED RECORDS
// =============================================

export interface BetRecord {
  bet_id: string;
  placed_at: number;
  sport: string;
  home: string;
  away: string;
  market: string;
  market_type: MarketType;
  market_threshold: number | null;
  bet_on: string;
  target_odds: number;
  fair_prob_pct: number;
  implied_prob_pct: number;
  ev_percent: number;
  match_id: string;
  start_time: number;
  commence_time: string | null;
  num_books: number;
  stake: number;
  kelly_fraction: number;
  kelly_used: number;
  potential_return: number;
  status: BetStatus;
  settled_at: number | null;
  profit: number | null;
  result_info: string | null;
}

export interface LedgerRecord {
  initial_bankroll: number;
  current_bankroll: number;
  total_staked: number;
  total_returned: number;
  created_at: number;
  last_updated: number;
  bets: BetRecord[];
}

export function toBetRecord(bet: Bet): BetRecord {
  return {
    bet_id: bet.betId,
    placed_at: bet.placedAt,
    sport: bet.sport,
    home: bet.home,
    away: bet.away,
    market: bet.market,
    market_type: bet.marketType,
    market_threshold: bet.threshold ?? null,
    bet_on: bet.betOn,
    target_odds: bet.targetOdds,
    fair_prob_pct: bet.fairProbPct,
    implied_prob_pct: bet.impliedProbPct,
    ev_percent: bet.evPercent,
    match_id: bet.matchId,
    start_time: bet.startTime,
    commence_time: bet.commenceTime ?? null,
    num_books: bet.numBooks,
    stake: bet.stake,
    kelly_fraction: bet.kellyFraction,
    kelly_used: bet.kellyUsed,
    potential_return: bet.potentialReturn,
    status: bet.status,
    settled_at: bet.settledAt,
    profit: bet.profit,
    result_info: bet.resultInfo,
  };
}

export function fromBetRecord(record: BetRecord): Bet {
  const bet: Bet = {
    betId: record.bet_id,
    placedAt: record.placed_at,
    sport: record.sport,
    home: record.home,
    away: record.away,
    market: record.market,
    marketType: record.market_type,
    betOn: record.bet_on,
    targetOdds: record.target_odds,
    fairProbPct: record.fair_prob_pct,
    impliedProbPct: record.implied_prob_pct,
    evPercent: record.ev_percent,
    matchId: record.match_id,
    startTime: record.start_time,
    numBooks: record.num_books,
    stake: record.stake,
    kellyFraction: record.kelly_fraction,
    kellyUsed: record.kelly_used,
    potentialReturn: record.potential_return,
    status: record.status,
    settledAt: record.settled_at,
    profit: record.profit,
    resultInfo: record.result_info,
  };
  if (record.market_threshold !== null) bet.threshold = record.market_threshold;
  if (record.commence_time !== null) bet.commenceTime = record.commence_time;
  return bet;
}

export function toLedgerRecord(ledger: BankrollLedger): LedgerRecord {
  return {
    initial_bankroll: ledger.initialBankroll,
    current_bankroll: ledger.currentBankroll,
    total_staked: ledger.totalStaked,
    total_returned: ledger.totalReturned,
    created_at: ledger.createdAt,
    last_updated: ledger.lastUpdated,
    bets: ledger.bets.map(toBetRecord),
  };
}

export function fromLedgerRecord(record: LedgerRecord): BankrollLedger {
  return {
    initialBankroll: record.initial_bankroll,
    currentBankroll: record.current_bankroll,
    totalStaked: record.total_staked,
    totalReturned: record.total_returned,
    createdAt: record.created_at,
    lastUpdated: record.last_updated,
    bets: record.bets.map(fromBetRecord),
  };
}

// =============================================
// RECORD VALIDATION
// =============================================

const MARKET_TYPES: readonly MarketType[] = ["h2h", "h2h_2way", "over_under", "btts", "unknown"];
const BET_STATUSES: readonly BetStatus[] = ["pending", "won", "lost", "void"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMarketType(value: unknown): value is MarketType {
  return MARKET_TYPES.some((t) => t === value);
}

function isBetStatus(value: unknown): value is BetStatus {
  return BET_STATUSES.some((s) => s === value);
}

class RecordReader {
  constructor(
    private readonly source: Record<string, unknown>,
    private readonly context: string
  ) {}

  private fail(key: string, expected: string): never {
    throw new LedgerReadError(`${this.context}: field "${key}" must be ${expected}`);
  }

  string(key: string): string {
    const value = this.source[key];
    return typeof value === "string" ? value : this.fail(key, "a string");
  }

  number(key: string): number {
    const value = this.source[key];
    return typeof value === "number" && Number.isFinite(value) ? value : this.fail(key, "a number");
  }

  optionalNumber(key: string): number | null {
    const value = this.source[key];
    if (value === null || value === undefined) return null;
    return this.number(key);
  }

  optionalString(key: string): string | null {
    const value = this.source[key];
    if (value === null || value === undefined) return null;
    return this.string(key);
  }

  marketType(key: string): MarketType {
    const value = this.source[key];
    return isMarketType(value) ? value : this.fail(key, "a market type");
  }

  status(key: string): BetStatus {
    const value = this.source[key];
    return isBetStatus(value) ? value : this.fail(key, "a bet status");
  }
}

export function parseBetRecord(value: unknown, index: number): BetRecord {
  if (!isObject(value)) {
    throw new LedgerReadError(`bet #${index}: not an object`);
  }
  const r = new RecordReader(value, `bet #${index}`);

  return {
    bet_id: r.string("bet_id"),
    placed_at: r.number("placed_at"),
    sport: r.string("sport"),
    home: r.string("home"),
    away: r.string("away"),
    market: r.string("market"),
    market_type: r.marketType("market_type"),
    market_threshold: r.optionalNumber("market_threshold"),
    bet_on: r.string("bet_on"),
    target_odds: r.number("target_odds"),
    fair_prob_pct: r.number("fair_prob_pct"),
    implied_prob_pct: r.number("implied_prob_pct"),
    ev_percent: r.number("ev_percent"),
    match_id: r.string("match_id"),
    start_time: r.optionalNumber("start_time") ?? 0,
    commence_time: r.optionalString("commence_time"),
    num_books: r.number("num_books"),
    stake: r.number("stake"),
    kelly_fraction: r.number("kelly_fraction"),
    kelly_used: r.number("kelly_used"),
    potential_return: r.number("potential_return"),
    status: r.status("status"),
    settled_at: r.optionalNumber("settled_at"),
    profit: r.optionalNumber("profit"),
    result_info: r.optionalString("result_info"),
  };
}

export function parseLedgerRecord(value: unknown): LedgerRecord {
  if (!isObject(value)) {
    throw new LedgerReadError("ledger: not an object");
  }
  const r = new RecordReader(value, "ledger");
  const bets = value.bets;
  if (!Array.isArray(bets)) {
    throw new LedgerReadError('ledger: field "bets" must be an array');
  }

  return {
    initial_bankroll: r.number("initial_bankroll"),
    current_bankroll: r.number("current_bankroll"),
    total_staked: r.number("total_staked"),
    total_returned: r.number("total_returned"),
    created_at: r.number("created_at"),
    last_updated: r.number("last_updated"),
    bets: bets.map((bet: unknown, index: number) => parseBetRecord(bet, index)),
  };
}

// =============================================
// SQLITE STORE
// =============================================

interface LedgerRow {
  initial_bankroll: number;
  current_bankroll: number;
  total_staked: number;
  total_returned: number;
  created_at: number;
  last_updated: number;
}

interface BetRow extends BetRecord {
  position: number;
}

const BET_COLUMNS = [
  "bet_id",
  "position",
  "placed_at",
  "sport",
  "home",
  "away",
  "market",
  "market_type",
  "market_threshold",
  "bet_on",
  "target_odds",
  "fair_prob_pct",
  "implied_prob_pct",
  "ev_percent",
  "match_id",
  "start_time",
  "commence_time",
  "num_books",
  "stake",
  "kelly_fraction",
  "kelly_used",
  "potential_return",
  "status",
  "settled_at",
  "profit",
  "result_info",
] as const;

export class SqliteLedgerStore implements LedgerStore {
  constructor(private readonly database: Database.Database = getDb()) {}

  load(): BankrollLedger | null {
    try {
      // Both reads share one transaction so they see the same committed state
      const readSnapshot = this.database.transaction((): { row: LedgerRow; bets: BetRow[] } | null => {
        const row = this.database
          .prepare<[], LedgerRow>(
            `SELECT initial_bankroll, current_bankroll, total_staked, total_returned, created_at, last_updated
             FROM ledger WHERE id = 1`
          )
          .get();

        if (!row) return null;

        const bets = this.database
          .prepare<[], BetRow>(`SELECT ${BET_COLUMNS.join(", ")} FROM ledger_bets ORDER BY position`)
          .all();
        return { row, bets };
      });

      const snapshot = readSnapshot();
      if (!snapshot) return null;

      return fromLedgerRecord({
        ...snapshot.row,
        bets: snapshot.bets.map((bet, index) => parseBetRecord(bet, index)),
      });
    } catch (error) {
      if (error instanceof LedgerReadError) throw error;
      throw new LedgerReadError(`Failed to load ledger: ${errorMessage(error)}`, { cause: error });
    }
  }

  save(ledger: BankrollLedger): void {
    const record = toLedgerRecord(ledger);

    const upsertLedger = this.database.prepare<[LedgerRow]>(
      `INSERT INTO ledger (id, initial_bankroll, current_bankroll, total_staked, total_returned, created_at, last_updated)
       VALUES (1, @initial_bankroll, @current_bankroll, @total_staked, @total_returned, @created_at, @last_updated)
       ON CONFLICT(id) DO UPDATE SET
         initial_bankroll = excluded.initial_bankroll,
         current_bankroll = excluded.current_bankroll,
         total_staked = excluded.total_staked,
         total_returned = excluded.total_returned,
         created_at = excluded.created_at,
         last_updated = excluded.last_updated`
    );
    const clearBets = this.database.prepare<[]>("DELETE FROM ledger_bets");
    const insertBet = this.database.prepare<[BetRow]>(
      `INSERT INTO ledger_bets (${BET_COLUMNS.join(", ")})
       VALUES (${BET_COLUMNS.map((c) => `@${c}`).join(", ")})`
    );

    const writeAll = this.database.transaction(() => {
      upsertLedger.run({
        initial_bankroll: record.initial_bankroll,
        current_bankroll: record.current_bankroll,
        total_staked: record.total_staked,
        total_returned: record.total_returned,
        created_at: record.created_at,
        last_updated: record.last_updated,
      });
      clearBets.run();
      record.bets.forEach((bet, position) => {
        insertBet.run({ ...bet, position });
      });
    });

    try {
      writeAll();
    } catch (error) {
      throw new LedgerWriteError(`Failed to save ledger: ${errorMessage(error)}`, { cause: error });
    }
  }
}

// =============================================
// JSON FILE STORE
// =============================================

export class FileLedgerStore implements LedgerStore {
  constructor(private readonly path: string) {}

  load(): BankrollLedger | null {
    if (!existsSync(this.path)) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.path, "utf8"));
    } catch (error) {
      throw new LedgerReadError(`Failed to read ledger file ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return fromLedgerRecord(parseLedgerRecord(parsed));
  }

  // Written beside the target then renamed over it
  save(ledger: BankrollLedger): void {
    const tmpPath = `${this.path}.tmp`;

    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(toLedgerRecord(ledger), null, 2), "utf8");
      renameSync(tmpPath, this.path);
    } catch (error) {
      rmSync(tmpPath, { force: true });
      throw new LedgerWriteError(`Failed to write ledger file ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export type LedgerBackend = "sqlite" | "file";

export function createLedgerStore(backend: LedgerBackend, filePath: string): LedgerStore {
  return backend === "file" ? new FileLedgerStore(filePath) : new SqliteLedgerStore();
}
