import type {
  BttsSide,
  DeviggedOutcome,
  MarketEvent,
  MarketFamily,
  ReferenceEvent,
  TotalsSide,
  ValueBet,
} from "./sports/types";
import {
  DEFAULT_TOTALS_THRESHOLD,
  DRAW_NAMES,
  MARKET_KEYWORDS,
  MAX_PLAUSIBLE_EV,
  OUTCOME_MATCH_THRESHOLD,
} from "./sports/config";
import {
  calculateEv,
  detectMarketType,
  devig,
  hasKeyword,
  impliedProbability,
  isDevigged,
  round,
} from "./odds.service";
import {
  defaultSimilarity,
  matchEvents,
  normalizeTeamName,
  partitionByThreshold,
  type MatchedPair,
  type StringSimilarity,
} from "./matcher.service";

// =============================================
// SIDE CLASSIFICATION
// =============================================

export function classifyTotalsSide(name: string): TotalsSide | null {
  const label = name.toLowerCase();
  if (MARKET_KEYWORDS.over.some((kw) => hasKeyword(label, kw))) return "over";
  if (MARKET_KEYWORDS.under.some((kw) => hasKeyword(label, kw))) return "under";
  return null;
}

export function classifyBttsSide(name: string): BttsSide | null {
  const label = name.toLowerCase();
  if (MARKET_KEYWORDS.yes.some((kw) => hasKeyword(label, kw))) return "yes";
  if (MARKET_KEYWORDS.no.some((kw) => hasKeyword(label, kw))) return "no";
  return null;
}

export function isDrawName(name: string): boolean {
  return DRAW_NAMES.has(normalizeTeamName(name));
}

// =============================================
// MARKET FAMILIES
// =============================================

/**
 * Resolve an event's market family. Unlabeled events are classified from
 * their outcome labels; totals without a line get the default line.
 */
export function resolveFamily<T extends MarketEvent>(event: T): { family: MarketFamily; event: T } | null {
  let marketType = event.marketType;
  let threshold = event.threshold;

  if (marketType === "unknown") {
    const detected = detectMarketType(event.outcomes);
    marketType = detected.marketType;
    threshold = threshold ?? detected.threshold;
  }

  switch (marketType) {
    case "h2h":
    case "h2h_2way":
      return { family: "h2h", event: { ...event, marketType } };
    case "over_under":
      return {
        family: "over_under",
        event: { ...event, marketType, threshold: threshold ?? DEFAULT_TOTALS_THRESHOLD },
      };
    case "btts":
      return { family: "btts", event: { ...event, marketType } };
    case "unknown":
      return null;
  }
}

function groupByFamily<T extends MarketEvent>(events: T[]): Record<MarketFamily, T[]> {
  const groups: Record<MarketFamily, T[]> = { h2h: [], over_under: [], btts: [] };
  for (const event of events) {
    const resolved = resolveFamily(event);
    if (resolved) groups[resolved.family].push(resolved.event);
  }
  return groups;
}

// =============================================
// FAIR PROBABILITY LOOKUP
// =============================================

/**
 * Fair probability for a head-to-head selection: best fuzzy name match
 * above the outcome threshold, else the draw class.
 */
export function findH2hFairProb(
  outcomeName: string,
  reference: DeviggedOutcome[],
  similarity: StringSimilarity = defaultSimilarity
): number | null {
  const targetName = normalizeTeamName(outcomeName);
  let bestProb: number | null = null;
  let bestSim = 0;

  for (const ref of reference) {
    const sim = similarity.similarity(targetName, normalizeTeamName(ref.name));
    if (sim > bestSim && sim > OUTCOME_MATCH_THRESHOLD) {
      bestSim = sim;
      bestProb = ref.fairProb;
    }
  }

  if (bestProb === null && DRAW_NAMES.has(targetName)) {
    const draw = reference.find((ref) => isDrawName(ref.name));
    if (draw) bestProb = draw.fairProb;
  }

  return bestProb;
}

function fairProbsBySide<S extends string>(
  reference: DeviggedOutcome[],
  classify: (name: string) => S | null
): Map<S, number> {
  const bySide = new Map<S, number>();
  for (const ref of reference) {
    const side = classify(ref.name);
    if (side) bySide.set(side, ref.fairProb);
  }
  return bySide;
}

// =============================================
// VALUE BET DETECTION
// =============================================

export function isPlausibleEv(evPercent: number, minEv: number): boolean {
  return evPercent > minEv && evPercent < MAX_PLAUSIBLE_EV;
}

function buildValueBet(
  pair: MatchedPair<MarketEvent, ReferenceEvent>,
  betOn: string,
  targetOdds: number,
  fairProb: number,
  evPercent: number,
  market: string
): ValueBet {
  const { target, reference } = pair;
  const bet: ValueBet = {
    sport: target.sport || reference.sport,
    home: target.home || reference.home,
    away: target.away || reference.away,
    market,
    marketType: target.marketType,
    betOn,
    targetOdds,
    fairProbPct: round(fairProb * 100, 1),
    impliedProbPct: round(impliedProbability(targetOdds) * 100, 1),
    evPercent,
    matchId: target.matchId,
    startTime: target.startTime,
    numBooks: reference.numBooks,
  };
  if (target.threshold !== undefined) bet.threshold = target.threshold;
  if (reference.commenceTime !== undefined) bet.commenceTime = reference.commenceTime;
  return bet;
}

type FairProbLookup = (outcomeName: string, reference: DeviggedOutcome[]) => number | null;

function collectValueBets(
  pairs: Array<MatchedPair<MarketEvent, ReferenceEvent>>,
  minEv: number,
  marketLabel: (target: MarketEvent) => string,
  lookup: FairProbLookup
): ValueBet[] {
  const valueBets: ValueBet[] = [];

  for (const pair of pairs) {
    const reference = devig(pair.reference.outcomes);
    if (!isDevigged(reference)) continue;

    for (const outcome of pair.target.outcomes) {
      const fairProb = lookup(outcome.name, reference);
      if (fairProb === null) continue;

      const evPercent = calculateEv(outcome.odds, fairProb);
      if (!isPlausibleEv(evPercent, minEv)) continue;

      valueBets.push(
        buildValueBet(pair, outcome.name, outcome.odds, fairProb, evPercent, marketLabel(pair.target))
      );
    }
  }

  return valueBets;
}

function findH2hValueBets(
  targets: MarketEvent[],
  references: ReferenceEvent[],
  minEv: number,
  similarity: StringSimilarity
): ValueBet[] {
  const pairs = matchEvents(targets, references, { similarity });
  return collectValueBets(
    pairs,
    minEv,
    (target) => target.market ?? "h2h",
    (name, reference) => findH2hFairProb(name, reference, similarity)
  );
}

function findLineValueBets(
  targets: MarketEvent[],
  references: ReferenceEvent[],
  minEv: number,
  similarity: StringSimilarity,
  marketLabel: (target: MarketEvent) => string,
  classify: (name: string) => string | null
): ValueBet[] {
  const valueBets: ValueBet[] = [];
  const referenceGroups = partitionByThreshold(references);

  for (const [threshold, targetGroup] of partitionByThreshold(targets)) {
    const referenceGroup = referenceGroups.get(threshold);
    if (!referenceGroup) continue;

    const pairs = matchEvents(targetGroup, referenceGroup, { similarity });
    valueBets.push(
      ...collectValueBets(pairs, minEv, marketLabel, (name, reference) => {
        const side = classify(name);
        if (!side) return null;
        return fairProbsBySide(reference, classify).get(side) ?? null;
      })
    );
  }

  return valueBets;
}

/**
 * Compare target-book prices with devigged reference consensus and return
 * the selections whose EV clears `minEv`, best first. Deterministic for
 * given inputs.
 */
export function detectValueBets(
  targetEvents: MarketEvent[],
  referenceEvents: ReferenceEvent[],
  minEv: number = 0,
  similarity: StringSimilarity = defaultSimilarity
): ValueBet[] {
  const targets = groupByFamily(targetEvents);
  const references = groupByFamily(referenceEvents);
  const valueBets: ValueBet[] = [];

  if (targets.h2h.length > 0 && references.h2h.length > 0) {
    valueBets.push(...findH2hValueBets(targets.h2h, references.h2h, minEv, similarity));
  }

  if (targets.over_under.length > 0 && references.over_under.length > 0) {
    valueBets.push(
      ...findLineValueBets(
        targets.over_under,
        references.over_under,
        minEv,
        similarity,
        (target) => `over_under_${target.threshold ?? DEFAULT_TOTALS_THRESHOLD}`,
        classifyTotalsSide
      )
    );
  }

  if (targets.btts.length > 0 && references.btts.length > 0) {
    valueBets.push(
      ...findLineValueBets(targets.btts, references.btts, minEv, similarity, () => "btts", classifyBttsSide)
    );
  }

  return dedupeValueBets(sortByEv(valueBets));
}

export function sortByEv(bets: ValueBet[]): ValueBet[] {
  return [...bets].sort((a, b) => b.evPercent - a.evPercent);
}

/**
 * Drop repeats of (home, away, betOn, market); first occurrence wins
 */
export function dedupeValueBets(bets: ValueBet[]): ValueBet[] {
  const seen = new Set<string>();
  const unique: ValueBet[] = [];

  for (const bet of bets) {
    const key = JSON.stringify([bet.home, bet.away, bet.betOn, bet.market]);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(bet);
  }

  return unique;
}
