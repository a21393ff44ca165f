import { readFile } from "fs/promises";
import { join } from "path";
import { SnapshotFormatError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type {
  MarketEvent,
  MarketFilter,
  MarketType,
  MatchResult,
  MatchStatus,
  OddsSource,
  Outcome,
  ReferenceEvent,
  ResultResolver,
} from "../services/sports/types";

// =============================================
// PARSING
// =============================================

const MARKET_TYPES: readonly MarketType[] = ["h2h", "h2h_2way", "over_under", "btts", "unknown"];
const MATCH_STATUSES: readonly MatchStatus[] = ["finished", "live", "cancelled"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(context: string, message: string): never {
  throw new SnapshotFormatError(`${context}: ${message}`);
}

function field(source: Record<string, unknown>, key: string, context: string) {
  const value = source[key];
  return {
    string(): string {
      return typeof value === "string" ? value : fail(context, `"${key}" must be a string`);
    },
    number(): number {
      return typeof value === "number" && Number.isFinite(value) ? value : fail(context, `"${key}" must be a number`);
    },
    optionalString(): string | undefined {
      return value === undefined || value === null ? undefined : this.string();
    },
    optionalNumber(): number | undefined {
      return value === undefined || value === null ? undefined : this.number();
    },
  };
}

function parseOutcome(value: unknown, context: string): Outcome {
  if (!isObject(value)) fail(context, "outcome must be an object");
  return {
    name: field(value, "name", context).string(),
    odds: field(value, "odds", context).number(),
  };
}

export function parseMarketEvent(value: unknown, context: string = "event"): MarketEvent {
  if (!isObject(value)) fail(context, "not an object");

  const marketType = value.marketType ?? "unknown";
  if (!MARKET_TYPES.some((t) => t === marketType)) fail(context, `unknown market type ${String(marketType)}`);
  const outcomes = value.outcomes;
  if (!Array.isArray(outcomes)) fail(context, '"outcomes" must be an array');

  const event: MarketEvent = {
    home: field(value, "home", context).string(),
    away: field(value, "away", context).string(),
    marketType: MARKET_TYPES.find((t) => t === marketType) ?? "unknown",
    outcomes: outcomes.map((o: unknown) => parseOutcome(o, context)),
    sport: field(value, "sport", context).string(),
    matchId: field(value, "matchId", context).optionalString() ?? "",
    startTime: field(value, "startTime", context).optionalNumber() ?? 0,
  };

  const threshold = field(value, "threshold", context).optionalNumber();
  const sportKey = field(value, "sportKey", context).optionalString();
  const market = field(value, "market", context).optionalString();
  if (threshold !== undefined) event.threshold = threshold;
  if (sportKey !== undefined) event.sportKey = sportKey;
  if (market !== undefined) event.market = market;
  return event;
}

export function parseReferenceEvent(value: unknown, context: string = "reference"): ReferenceEvent {
  const event = parseMarketEvent(value, context);
  if (!isObject(value)) fail(context, "not an object");

  const reference: ReferenceEvent = {
    ...event,
    numBooks: field(value, "numBooks", context).optionalNumber() ?? 1,
  };
  const commenceTime = field(value, "commenceTime", context).optionalString();
  if (commenceTime !== undefined) reference.commenceTime = commenceTime;
  return reference;
}

export function parseMatchResult(value: unknown, context: string = "result"): MatchResult {
  if (!isObject(value)) fail(context, "not an object");

  const status = MATCH_STATUSES.find((s) => s === value.status);
  if (!status) fail(context, `unknown status ${String(value.status)}`);

  const winners = value.winningOutcomes ?? [];
  if (!Array.isArray(winners) || !winners.every((w: unknown) => typeof w === "string")) {
    fail(context, '"winningOutcomes" must be a list of names');
  }

  return {
    status,
    score: field(value, "score", context).optionalString() ?? "",
    winningOutcomes: winners.filter((w: unknown): w is string => typeof w === "string"),
  };
}

// =============================================
// FILE ACCESS
// =============================================

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readJson(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SnapshotFormatError(`${path}: invalid JSON (${errorMessage(error)})`, { cause: error });
  }
}

async function readJsonIfPresent(path: string): Promise<unknown> {
  try {
    return await readJson(path);
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
}

function inFamily(event: MarketEvent, filter: MarketFilter): boolean {
  switch (filter) {
    case "all":
      return true;
    case "h2h":
      return event.marketType === "h2h" || event.marketType === "h2h_2way";
    default:
      return event.marketType === filter;
  }
}

// =============================================
// SOURCES
// =============================================

/**
 * Odds read from JSON snapshots: one file of target-book events and one
 * file of consensus reference events per sport key (`<dir>/<sportKey>.json`).
 */
export class SnapshotOddsSource implements OddsSource {
  constructor(
    private readonly targetFile: string,
    private readonly referenceDir: string
  ) {}

  async fetchTargetEvents(): Promise<MarketEvent[]> {
    const data = await readJson(this.targetFile);
    if (!Array.isArray(data)) {
      throw new SnapshotFormatError(`${this.targetFile}: expected a list of events`);
    }
    return data.map((item: unknown, i: number) => parseMarketEvent(item, `${this.targetFile}[${i}]`));
  }

  async fetchReferenceEvents(sportKey: string, marketFilter: MarketFilter): Promise<ReferenceEvent[]> {
    const path = join(this.referenceDir, `${sportKey}.json`);
    const data = await readJsonIfPresent(path);

    if (data === undefined) {
      logger.debug(`No reference snapshot for ${sportKey}`);
      return [];
    }
    if (!Array.isArray(data)) {
      throw new SnapshotFormatError(`${path}: expected a list of events`);
    }

    return data
      .map((item: unknown, i: number) => parseReferenceEvent(item, `${path}[${i}]`))
      .filter((event) => inFamily(event, marketFilter));
  }
}

/**
 * Results keyed by match id, read from one JSON file. The file is re-read
 * on every lookup so results added between runs are picked up.
 */
export class SnapshotResultSource {
  constructor(private readonly resultsFile: string) {}

  async lookup(matchId: string): Promise<MatchResult | null> {
    const data = await readJsonIfPresent(this.resultsFile);
    if (data === undefined) return null;
    if (!isObject(data)) {
      throw new SnapshotFormatError(`${this.resultsFile}: expected an object keyed by match id`);
    }

    const entry = data[matchId];
    if (entry === undefined || entry === null) return null;
    return parseMatchResult(entry, `${this.resultsFile}[${matchId}]`);
  }

  resolver(): ResultResolver {
    return (matchId) => this.lookup(matchId);
  }
}
