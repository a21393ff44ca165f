/**
 * Fuzzy matching between target-book events and reference events.
 * Team names differ between sources ("Paris SG" vs "Paris Saint-Germain FC"),
 * so pairing is done on normalized-name similarity rather than equality.
 */

import { CLUB_TOKENS, EVENT_MATCH_THRESHOLD } from "./sports/config";

export interface StringSimilarity {
  similarity(a: string, b: string): number;
}

/**
 * Longest-matching-block ratio: 2 * matched chars / total chars.
 * Blocks are found recursively (longest common substring, then the
 * pieces left and right of it).
 */
export class SequenceRatio implements StringSimilarity {
  similarity(a: string, b: string): number {
    const total = a.length + b.length;
    if (total === 0) return 1;
    return (2 * countMatchingChars(a, b)) / total;
  }
}

export const defaultSimilarity: StringSimilarity = new SequenceRatio();

function longestMatch(
  a: string,
  b: string,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): { i: number; j: number; size: number } {
  let best = { i: alo, j: blo, size: 0 };
  // run[j - blo + 1] = length of the common run ending at (i, j)
  let prev: number[] = new Array(bhi - blo + 1).fill(0);

  for (let i = alo; i < ahi; i++) {
    const cur: number[] = new Array(bhi - blo + 1).fill(0);
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (prev[j - blo] ?? 0) + 1;
      cur[j - blo + 1] = size;
      if (size > best.size) {
        best = { i: i - size + 1, j: j - size + 1, size };
      }
    }
    prev = cur;
  }

  return best;
}

function countMatchingChars(a: string, b: string): number {
  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, b, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }

  return matched;
}

// =============================================
// NAME NORMALIZATION
// =============================================

export function normalizeTeamName(name: string): string {
  return name
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0 && !CLUB_TOKENS.has(token))
    .join(" ");
}

export function teamSimilarity(
  a: string,
  b: string,
  similarity: StringSimilarity = defaultSimilarity
): number {
  return similarity.similarity(normalizeTeamName(a), normalizeTeamName(b));
}

// =============================================
// EVENT MATCHING
// =============================================

export interface Teams {
  home: string;
  away: string;
}

export interface MatchedPair<T, R> {
  target: T;
  reference: R;
  score: number;
}

export interface MatchOptions {
  threshold?: number;
  similarity?: StringSimilarity;
}

/**
 * Score two fixtures, tolerating swapped home/away labels
 */
export function fixtureSimilarity(
  target: Teams,
  reference: Teams,
  similarity: StringSimilarity = defaultSimilarity
): number {
  const straight =
    (teamSimilarity(target.home, reference.home, similarity) +
      teamSimilarity(target.away, reference.away, similarity)) / 2;
  const swapped =
    (teamSimilarity(target.home, reference.away, similarity) +
      teamSimilarity(target.away, reference.home, similarity)) / 2;
  return Math.max(straight, swapped);
}

/**
 * Greedy first-come matching: each target takes its best unused reference
 * (first scanned wins ties) when the score clears the threshold.
 * Callers must pass events of a single market family and line.
 */
export function matchEvents<T extends Teams, R extends Teams>(
  targets: T[],
  references: R[],
  options: MatchOptions = {}
): Array<MatchedPair<T, R>> {
  const threshold = options.threshold ?? EVENT_MATCH_THRESHOLD;
  const similarity = options.similarity ?? defaultSimilarity;
  const used = new Set<number>();
  const matched: Array<MatchedPair<T, R>> = [];

  for (const target of targets) {
    let bestIndex = -1;
    let bestScore = 0;

    references.forEach((reference, index) => {
      if (used.has(index)) return;
      const score = fixtureSimilarity(target, reference, similarity);
      if (score > bestScore && score >= threshold) {
        bestScore = score;
        bestIndex = index;
      }
    });

    const reference = references[bestIndex];
    if (reference) {
      used.add(bestIndex);
      matched.push({ target, reference, score: bestScore });
    }
  }

  return matched;
}

/**
 * Group events by line so totals are never matched across thresholds.
 * Events without a line share the `null` group.
 */
export function partitionByThreshold<T extends { threshold?: number }>(
  events: T[]
): Map<number | null, T[]> {
  const groups = new Map<number | null, T[]>();
  for (const event of events) {
    const key = event.threshold ?? null;
    const group = groups.get(key);
    if (group) {
      group.push(event);
    } else {
      groups.set(key, [event]);
    }
  }
  return groups;
}
