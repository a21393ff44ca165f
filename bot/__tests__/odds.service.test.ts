import { describe, expect, test } from "vitest";
import {
  calculateEv,
  detectMarketType,
  devig,
  hasKeyword,
  impliedProbability,
  isDevigged,
  isPlausibleMargin,
  overround,
  round,
} from "../services/odds.service";

describe("odds.service", () => {
  describe("impliedProbability", () => {
    test("should invert decimal odds", () => {
      expect(impliedProbability(2)).toBe(0.5);
      expect(impliedProbability(4)).toBe(0.25);
    });

    test("should return 0 for non-positive odds", () => {
      expect(impliedProbability(0)).toBe(0);
      expect(impliedProbability(-1.5)).toBe(0);
    });
  });

  describe("devig", () => {
    test("should normalize fair probabilities to sum to 1", () => {
      const outcomes = devig([
        { name: "Home", odds: 1.85 },
        { name: "Draw", odds: 3.6 },
        { name: "Away", odds: 4.2 },
      ]);

      const total = outcomes.reduce((sum, o) => sum + o.fairProb, 0);
      expect(Math.abs(total - 1)).toBeLessThan(1e-6);
    });

    test("should remove a uniform margin exactly", () => {
      const outcomes = devig([
        { name: "Over 2.5", odds: 1.9 },
        { name: "Under 2.5", odds: 1.9 },
      ]);

      expect(outcomes[0]?.fairProb).toBeCloseTo(0.5, 10);
      expect(outcomes[1]?.fairProb).toBeCloseTo(0.5, 10);
      expect(outcomes[0]?.impliedProb).toBeCloseTo(1 / 1.9, 10);
    });

    test("should keep names and odds", () => {
      const [first] = devig([{ name: "Home", odds: 2 }, { name: "Away", odds: 2 }]);
      expect(first?.name).toBe("Home");
      expect(first?.odds).toBe(2);
    });

    test("should mark a zero-total book as unusable", () => {
      const outcomes = devig([
        { name: "Home", odds: 0 },
        { name: "Away", odds: 0 },
      ]);

      expect(outcomes.map((o) => o.fairProb)).toEqual([0, 0]);
      expect(isDevigged(outcomes)).toBe(false);
    });
  });

  describe("overround", () => {
    test("should sum implied probabilities of real prices", () => {
      expect(overround([{ name: "A", odds: 2 }, { name: "B", odds: 2 }])).toBe(1);
      expect(overround([{ name: "A", odds: 2 }, { name: "B", odds: 1 }])).toBe(0.5);
    });

    test("should accept sharp margins and reject soft ones", () => {
      expect(isPlausibleMargin([{ name: "A", odds: 1.9 }, { name: "B", odds: 1.9 }])).toBe(true);
      expect(isPlausibleMargin([{ name: "A", odds: 1.5 }, { name: "B", odds: 1.5 }])).toBe(false);
      expect(isPlausibleMargin([{ name: "A", odds: 2.2 }, { name: "B", odds: 2.2 }])).toBe(false);
    });
  });

  describe("calculateEv", () => {
    test("should compute EV percent rounded to 2 decimals", () => {
      expect(calculateEv(2.0, 0.6)).toBe(20);
      expect(calculateEv(2.1, 0.5)).toBe(5);
      expect(calculateEv(1.8, 0.5)).toBe(-10);
    });

    test("should increase strictly with odds for a fixed probability", () => {
      const evs = [1.5, 1.8, 2.0, 2.5, 3.0].map((odds) => calculateEv(odds, 0.45));
      for (let i = 1; i < evs.length; i++) {
        expect(evs[i]).toBeGreaterThan(evs[i - 1] ?? Infinity);
      }
    });
  });

  describe("round", () => {
    test("should round to the given number of decimals", () => {
      expect(round(4.76, 1)).toBe(4.8);
      expect(round(1.23456, 2)).toBe(1.23);
    });
  });

  describe("detectMarketType", () => {
    test("should detect totals and extract the line", () => {
      expect(
        detectMarketType([
          { name: "Plus de 3,5 buts", odds: 2.4 },
          { name: "Moins de 3,5 buts", odds: 1.55 },
        ])
      ).toEqual({ marketType: "over_under", threshold: 3.5 });
    });

    test("should fall back to the default line when none is printed", () => {
      expect(
        detectMarketType([
          { name: "Over", odds: 1.9 },
          { name: "Under", odds: 1.9 },
        ])
      ).toEqual({ marketType: "over_under", threshold: 2.5 });
    });

    test("should detect both-teams-to-score markets", () => {
      expect(
        detectMarketType([
          { name: "Les 2 equipes marquent: Oui", odds: 1.8 },
          { name: "Les 2 equipes marquent: Non", odds: 1.95 },
        ])
      ).toEqual({ marketType: "btts" });
    });

    test("should classify by outcome count otherwise", () => {
      const three = [
        { name: "Lens", odds: 2.5 },
        { name: "Nul", odds: 3.2 },
        { name: "Lille", odds: 2.9 },
      ];
      expect(detectMarketType(three)).toEqual({ marketType: "h2h" });
      expect(detectMarketType(three.slice(0, 2))).toEqual({ marketType: "h2h_2way" });
      expect(detectMarketType([])).toEqual({ marketType: "unknown" });
    });

    test("should not read keywords inside team names", () => {
      expect(
        detectMarketType([
          { name: "Hannover 96", odds: 2.1 },
          { name: "Nul", odds: 3.4 },
          { name: "Mainz 05", odds: 3.3 },
        ])
      ).toEqual({ marketType: "h2h" });
    });
  });

  describe("hasKeyword", () => {
    test("should match whole words only", () => {
      expect(hasKeyword("over 2.5", "over")).toBe(true);
      expect(hasKeyword("over2.5", "over")).toBe(true);
      expect(hasKeyword("hannover 96", "over")).toBe(false);
      expect(hasKeyword("non", "no")).toBe(false);
      expect(hasKeyword("les 2 equipes marquent: non", "marquent")).toBe(true);
    });

    test("should match symbol-edged keywords as plain text", () => {
      expect(hasKeyword("+2.5 buts", "+2.")).toBe(true);
      expect(hasKeyword("2.5 buts", "+2.")).toBe(false);
    });
  });
});
