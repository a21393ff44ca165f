import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type Database from "better-sqlite3";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { openDb } from "../db/index";
import {
  FileLedgerStore,
  SqliteLedgerStore,
  parseLedgerRecord,
  toLedgerRecord,
} from "../db/repositories/ledger.repo";
import { Ledger, freshLedger } from "../services/ledger.service";
import type { BankrollLedger, Bet } from "../services/sports/types";
import { LedgerReadError, LedgerWriteError } from "../utils/errors";
import { makeValueBet } from "./fixtures/events.fixtures";

function sampleBet(overrides: Partial<Bet> = {}): Bet {
  return {
    ...makeValueBet(),
    betId: "a1b2c3d4e5f6",
    placedAt: 1_799_990_000,
    stake: 5,
    kellyFraction: 0.05,
    kellyUsed: 0.25,
    potentialReturn: 10,
    status: "pending",
    settledAt: null,
    profit: null,
    resultInfo: null,
    ...overrides,
  };
}

function sampleLedger(): BankrollLedger {
  const ledger = freshLedger(100, 1_799_900_000);
  ledger.currentBankroll = 90;
  ledger.totalStaked = 10;
  ledger.bets = [
    sampleBet(),
    sampleBet({
      betId: "0f0e0d0c0b0a",
      market: "over_under_2.5",
      marketType: "over_under",
      threshold: 2.5,
      betOn: "Plus de 2.5",
      commenceTime: "2027-01-15T08:00:00Z",
      status: "won",
      settledAt: 1_800_010_000,
      profit: 5,
      resultInfo: "2-1",
    }),
  ];
  return ledger;
}

describe("ledger.repo", () => {
  describe("records", () => {
    test("should persist snake_case fields", () => {
      const record = toLedgerRecord(sampleLedger());

      expect(record.initial_bankroll).toBe(100);
      expect(record.current_bankroll).toBe(90);
      expect(record.bets[1]).toMatchObject({
        bet_id: "0f0e0d0c0b0a",
        market_type: "over_under",
        market_threshold: 2.5,
        bet_on: "Plus de 2.5",
        target_odds: 2,
        fair_prob_pct: 60,
        ev_percent: 20,
        match_id: "psg-ol",
        num_books: 5,
        status: "won",
        settled_at: 1_800_010_000,
        result_info: "2-1",
      });
      expect(record.bets[0]?.market_threshold).toBeNull();
    });

    test("should reject records with missing or mistyped fields", () => {
      const record = toLedgerRecord(sampleLedger());

      expect(() => parseLedgerRecord({ ...record, current_bankroll: "90" })).toThrow(LedgerReadError);
      expect(() => parseLedgerRecord({ ...record, bets: {} })).toThrow(LedgerReadError);
      expect(() => parseLedgerRecord({ ...record, bets: [{ ...record.bets[0], status: "open" }] })).toThrow(
        'bet #0: field "status" must be a bet status'
      );
      expect(() => parseLedgerRecord(null)).toThrow(LedgerReadError);
    });
  });

  describe("SqliteLedgerStore", () => {
    let database: Database.Database;
    let store: SqliteLedgerStore;

    beforeEach(() => {
      database = openDb(":memory:");
      store = new SqliteLedgerStore(database);
    });

    afterEach(() => {
      database.close();
    });

    test("should load null before the first save", () => {
      expect(store.load()).toBeNull();
    });

    test("should round-trip the ledger and keep bet order", () => {
      const ledger = sampleLedger();
      store.save(ledger);

      expect(store.load()).toEqual(ledger);
    });

    test("should replace the previous record on save", () => {
      store.save(sampleLedger());
      const smaller = { ...sampleLedger(), bets: [sampleBet()] };
      store.save(smaller);

      expect(store.load()?.bets.map((b) => b.betId)).toEqual(["a1b2c3d4e5f6"]);
    });

    test("should keep the previous record when a save fails", () => {
      const ledger = sampleLedger();
      store.save(ledger);

      const duplicateIds = { ...ledger, bets: [sampleBet(), sampleBet()] };
      expect(() => store.save(duplicateIds)).toThrow(LedgerWriteError);
      expect(store.load()).toEqual(ledger);
    });

    test("should read the ledger row and its bets in one transaction", () => {
      store.save(sampleLedger());
      const transaction = vi.spyOn(database, "transaction");

      expect(store.load()?.bets.map((b) => b.betId)).toEqual(["a1b2c3d4e5f6", "0f0e0d0c0b0a"]);
      expect(transaction).toHaveBeenCalledTimes(1);
      expect(database.inTransaction).toBe(false);
    });

    test("should back a Ledger", () => {
      const ledger = new Ledger(store);
      ledger.placeBets([makeValueBet()]);

      const reopened = new Ledger(new SqliteLedgerStore(database));
      expect(reopened.read().currentBankroll).toBe(95);
      expect(reopened.read().bets).toHaveLength(1);
    });
  });

  describe("FileLedgerStore", () => {
    let dir: string;
    let path: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "ev-ledger-"));
      path = join(dir, "nested", "bankroll.json");
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test("should load null when the file does not exist", () => {
      expect(new FileLedgerStore(path).load()).toBeNull();
    });

    test("should round-trip the ledger as snake_case JSON", () => {
      const store = new FileLedgerStore(path);
      const ledger = sampleLedger();
      store.save(ledger);

      expect(store.load()).toEqual(ledger);
      expect(JSON.parse(readFileSync(path, "utf8")).bets[1].bet_id).toBe("0f0e0d0c0b0a");
      expect(existsSync(`${path}.tmp`)).toBe(false);
    });

    test("should report a corrupt file instead of replacing it", () => {
      const store = new FileLedgerStore(path);
      store.save(sampleLedger());
      writeFileSync(path, "{ not json", "utf8");

      expect(() => store.load()).toThrow(LedgerReadError);
      expect(readFileSync(path, "utf8")).toBe("{ not json");
    });

    test("should surface write failures and clean up the temp file", () => {
      // The target path is an existing directory, so the rename fails
      const blocked = new FileLedgerStore(dir);

      expect(() => blocked.save(sampleLedger())).toThrow(LedgerWriteError);
      expect(existsSync(`${dir}.tmp`)).toBe(false);
    });
  });
});
