import { describe, expect, test } from "vitest";
import {
  SequenceRatio,
  fixtureSimilarity,
  matchEvents,
  normalizeTeamName,
  partitionByThreshold,
  teamSimilarity,
  type StringSimilarity,
} from "../services/matcher.service";

describe("matcher.service", () => {
  describe("normalizeTeamName", () => {
    test("should lowercase, strip accents and punctuation", () => {
      expect(normalizeTeamName("Atlético Madrid")).toBe("atletico madrid");
      expect(normalizeTeamName("Paris Saint-Germain")).toBe("paris saint germain");
    });

    test("should drop club tokens", () => {
      expect(normalizeTeamName("Paris SG FC")).toBe("paris sg");
      expect(normalizeTeamName("AC Milan")).toBe("milan");
      expect(normalizeTeamName("Manchester Utd")).toBe("manchester");
    });

    test("should collapse whitespace", () => {
      expect(normalizeTeamName("  Real   Sociedad ")).toBe("real sociedad");
    });
  });

  describe("SequenceRatio", () => {
    const ratio = new SequenceRatio();

    test("should score identical strings 1 and disjoint strings 0", () => {
      expect(ratio.similarity("lyon", "lyon")).toBe(1);
      expect(ratio.similarity("abcd", "wxyz")).toBe(0);
      expect(ratio.similarity("", "")).toBe(1);
    });

    test("should count matching blocks on both sides of the longest one", () => {
      // "paris s" then "g": 8 matched chars over 27
      expect(ratio.similarity("paris sg", "paris saint germain")).toBeCloseTo(16 / 27, 10);
    });

    test("should score a shared prefix against both lengths", () => {
      const score = ratio.similarity("olympique lyon", "olympique lyonnais");
      expect(score).toBeCloseTo(28 / 32, 10);
    });
  });

  describe("teamSimilarity", () => {
    test("should compare normalized names", () => {
      expect(teamSimilarity("Paris SG", "Paris SG FC")).toBe(1);
    });

    test("should use an injected similarity", () => {
      const always: StringSimilarity = { similarity: () => 0.42 };
      expect(teamSimilarity("A", "B", always)).toBe(0.42);
    });
  });

  describe("fixtureSimilarity", () => {
    test("should tolerate swapped home and away", () => {
      expect(
        fixtureSimilarity({ home: "Lyon", away: "Marseille" }, { home: "Marseille", away: "Lyon" })
      ).toBe(1);
    });
  });

  describe("matchEvents", () => {
    const references = [
      { home: "Olympique Lyonnais", away: "Paris SG FC", id: "r1" },
      { home: "Lens", away: "Lille", id: "r2" },
    ];

    test("should pair each target with its best reference", () => {
      const pairs = matchEvents(
        [
          { home: "Lens", away: "Lille", id: "t1" },
          { home: "Paris SG", away: "Olympique Lyon", id: "t2" },
        ],
        references
      );

      expect(pairs.map((p) => [p.target.id, p.reference.id])).toEqual([
        ["t1", "r2"],
        ["t2", "r1"],
      ]);
      expect(pairs[0]?.score).toBe(1);
      expect(pairs[1]?.score).toBeCloseTo((1 + 28 / 32) / 2, 10);
    });

    test("should drop targets below the threshold", () => {
      const pairs = matchEvents([{ home: "Nantes", away: "Rennes", id: "t1" }], references);
      expect(pairs).toEqual([]);
    });

    test("should use each reference at most once, first target first", () => {
      const pairs = matchEvents(
        [
          { home: "Lens", away: "Lille", id: "t1" },
          { home: "Lens", away: "Lille", id: "t2" },
        ],
        references
      );

      expect(pairs).toHaveLength(1);
      expect(pairs[0]?.target.id).toBe("t1");
    });

    test("should honor a custom threshold", () => {
      const pairs = matchEvents([{ home: "Lens", away: "Lille", id: "t1" }], references, { threshold: 1.01 });
      expect(pairs).toEqual([]);
    });
  });

  describe("partitionByThreshold", () => {
    test("should group events by line", () => {
      const groups = partitionByThreshold([
        { id: "a", threshold: 2.5 },
        { id: "b", threshold: 3.5 },
        { id: "c", threshold: 2.5 },
        { id: "d" },
      ]);

      expect(groups.get(2.5)?.map((e) => e.id)).toEqual(["a", "c"]);
      expect(groups.get(3.5)?.map((e) => e.id)).toEqual(["b"]);
      expect(groups.get(null)?.map((e) => e.id)).toEqual(["d"]);
    });
  });
});
