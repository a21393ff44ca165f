import { beforeEach, describe, expect, test, vi } from "vitest";
import { Ledger } from "../services/ledger.service";
import {
  RefreshState,
  computeStats,
  filterValueBets,
  isStale,
  runRefresh,
} from "../services/refresh.service";
import type { MarketEvent, OddsSource, ReferenceEvent } from "../services/sports/types";
import {
  MemoryLedgerStore,
  REFERENCE_EVENTS,
  REFERENCE_H2H,
  TARGET_EVENTS,
  TARGET_H2H,
  makeValueBet,
} from "./fixtures/events.fixtures";

function oddsSource(targets: MarketEvent[], references: ReferenceEvent[]) {
  return {
    fetchTargetEvents: vi.fn<OddsSource["fetchTargetEvents"]>().mockResolvedValue(targets),
    fetchReferenceEvents: vi.fn<OddsSource["fetchReferenceEvents"]>().mockResolvedValue(references),
  };
}

describe("refresh.service", () => {
  let ledger: Ledger;
  let state: RefreshState;

  beforeEach(() => {
    ledger = new Ledger(new MemoryLedgerStore());
    state = new RefreshState();
  });

  describe("runRefresh", () => {
    test("should detect, record stats and place qualifying bets", async () => {
      const odds = oddsSource(TARGET_EVENTS, REFERENCE_EVENTS);

      const { started, snapshot } = await runRefresh({ ledger, odds, state });

      expect(started).toBe(true);
      expect(odds.fetchReferenceEvents).toHaveBeenCalledWith("soccer_france_ligue_one", "all");
      expect(snapshot.status).toBe("ready");
      expect(snapshot.progress).toBe(100);
      expect(snapshot.lastUpdate).toBeGreaterThan(0);
      expect(snapshot.targetEvents).toHaveLength(3);
      expect(snapshot.valueBets.map((b) => b.betOn)).toEqual(["Olympique Lyon", "Plus de 2.5", "Paris SG", "Non"]);
      expect(snapshot.stats).toEqual({
        totalBets: 4,
        totalEvents: 3,
        avgEv: 7.5,
        bySport: { soccer: 4 },
        topSport: "soccer",
      });
      expect(ledger.read().bets).toHaveLength(4);
    });

    test("should pass the market filter to the reference source", async () => {
      const odds = oddsSource([TARGET_H2H], [REFERENCE_H2H]);

      await runRefresh({ ledger, odds, state, marketFilter: "h2h" });

      expect(odds.fetchReferenceEvents).toHaveBeenCalledWith("soccer_france_ligue_one", "h2h");
    });

    test("should refuse to start while another refresh is running", async () => {
      const odds = oddsSource(TARGET_EVENTS, REFERENCE_EVENTS);
      state.tryBegin();

      const { started, snapshot } = await runRefresh({ ledger, odds, state });

      expect(started).toBe(false);
      expect(snapshot.status).toBe("loading");
      expect(odds.fetchTargetEvents).not.toHaveBeenCalled();
      expect(ledger.read().bets).toEqual([]);
    });

    test("should carry on when one sport's references fail", async () => {
      const nba: MarketEvent = {
        ...TARGET_H2H,
        home: "Celtics",
        away: "Knicks",
        sport: "basketball",
        sportKey: "basketball_nba",
        matchId: "bos-nyk",
      };
      const odds = oddsSource([nba, ...TARGET_EVENTS], REFERENCE_EVENTS);
      odds.fetchReferenceEvents.mockImplementation(async (sportKey) => {
        if (sportKey === "basketball_nba") throw new Error("timeout");
        return REFERENCE_EVENTS;
      });

      const { snapshot } = await runRefresh({ ledger, odds, state });

      expect(snapshot.status).toBe("ready");
      expect(snapshot.valueBets).toHaveLength(4);
      expect(snapshot.stats?.totalEvents).toBe(4);
      expect(snapshot.logs.map((l) => l.msg)).toContain("basketball_nba: skipped (timeout)");
    });

    test("should drop references with an implausible margin", async () => {
      const padded: ReferenceEvent = {
        ...REFERENCE_H2H,
        outcomes: [
          { name: "Paris SG FC", odds: 1.5 },
          { name: "Draw", odds: 3.0 },
          { name: "Olympique Lyonnais", odds: 3.0 },
        ],
      };
      const odds = oddsSource([TARGET_H2H], [padded]);

      const { snapshot } = await runRefresh({ ledger, odds, state });

      expect(snapshot.valueBets).toEqual([]);
      expect(snapshot.logs.map((l) => l.msg)).toContain(
        "soccer_france_ligue_one: dropped 1 references with implausible margin"
      );
    });

    test("should mark the state as errored when target events cannot be fetched", async () => {
      const odds = oddsSource([], []);
      odds.fetchTargetEvents.mockRejectedValue(new Error("offline"));

      const { started, snapshot } = await runRefresh({ ledger, odds, state });

      expect(started).toBe(true);
      expect(snapshot.status).toBe("error");
      expect(snapshot.error).toBe("offline");
      expect(snapshot.logs.at(-1)?.msg).toBe("Error: offline");
    });

    test("should keep the previous results when a later refresh fails", async () => {
      const odds = oddsSource(TARGET_EVENTS, REFERENCE_EVENTS);
      const first = await runRefresh({ ledger, odds, state });

      odds.fetchTargetEvents.mockRejectedValueOnce(new Error("offline"));
      const { snapshot } = await runRefresh({ ledger, odds, state });

      expect(snapshot.status).toBe("error");
      expect(snapshot.valueBets).toEqual(first.snapshot.valueBets);
      expect(snapshot.valueBets).toHaveLength(4);
      expect(snapshot.targetEvents).toHaveLength(3);
      expect(snapshot.stats).toEqual(first.snapshot.stats);
      expect(snapshot.lastUpdate).toBe(first.snapshot.lastUpdate);
    });

    test("should keep the previous results visible while a refresh runs", async () => {
      const odds = oddsSource(TARGET_EVENTS, REFERENCE_EVENTS);
      await runRefresh({ ledger, odds, state });

      state.tryBegin();

      expect(state.snapshot().status).toBe("loading");
      expect(state.snapshot().valueBets).toHaveLength(4);
    });

    test("should allow a new refresh after an error", async () => {
      const odds = oddsSource(TARGET_EVENTS, REFERENCE_EVENTS);
      odds.fetchTargetEvents.mockRejectedValueOnce(new Error("offline"));

      await runRefresh({ ledger, odds, state });
      const { started, snapshot } = await runRefresh({ ledger, odds, state });

      expect(started).toBe(true);
      expect(snapshot.status).toBe("ready");
      expect(snapshot.error).toBeNull();
    });
  });

  describe("isStale", () => {
    test("should be stale before the first refresh", () => {
      expect(isStale(state.snapshot(), 120, 5_000)).toBe(true);
    });

    test("should compare the last update against the cache window", () => {
      const snapshot = { ...state.snapshot(), lastUpdate: 1_000_000 };

      expect(isStale(snapshot, 120, 1_120_000)).toBe(false);
      expect(isStale(snapshot, 120, 1_120_001)).toBe(true);
    });
  });

  describe("computeStats", () => {
    test("should report zeros without value bets", () => {
      expect(computeStats([], 7)).toEqual({
        totalBets: 0,
        totalEvents: 7,
        avgEv: 0,
        bySport: {},
        topSport: "-",
      });
    });

    test("should pick the sport with the most value bets", () => {
      const stats = computeStats(
        [
          makeValueBet({ sport: "tennis", evPercent: 3 }),
          makeValueBet({ evPercent: 4 }),
          makeValueBet({ evPercent: 4.5 }),
        ],
        5
      );

      expect(stats.bySport).toEqual({ tennis: 1, soccer: 2 });
      expect(stats.topSport).toBe("soccer");
      expect(stats.avgEv).toBe(3.83);
    });
  });

  describe("filterValueBets", () => {
    const soccer = makeValueBet();
    const tennis = makeValueBet({ sport: "tennis", targetOdds: 3.5, evPercent: 4 });

    test("should filter by sport, EV and odds range", () => {
      expect(filterValueBets([soccer, tennis], { sport: "tennis" })).toEqual([tennis]);
      expect(filterValueBets([soccer, tennis], { sport: "all" })).toEqual([soccer, tennis]);
      expect(filterValueBets([soccer, tennis], { minEv: 10 })).toEqual([soccer]);
      expect(filterValueBets([soccer, tennis], { minOdds: 2.5 })).toEqual([tennis]);
      expect(filterValueBets([soccer, tennis], { maxOdds: 2 })).toEqual([soccer]);
    });

    test("should keep everything without a filter", () => {
      expect(filterValueBets([soccer, tennis])).toEqual([soccer, tennis]);
    });
  });
});
