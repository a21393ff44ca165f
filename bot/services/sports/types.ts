// =============================================
// VALUE BETTING TYPES
// =============================================

export type MarketType = "h2h" | "h2h_2way" | "over_under" | "btts" | "unknown";

// Market families compared against each other (h2h_2way rides with h2h)
export type MarketFamily = "h2h" | "over_under" | "btts";

export type TotalsSide = "over" | "under";
export type BttsSide = "yes" | "no";

export interface Outcome {
  name: string;
  odds: number;
}

export interface DeviggedOutcome extends Outcome {
  impliedProb: number;
  fairProb: number;
}

export interface MarketEvent {
  home: string;
  away: string;
  marketType: MarketType;
  threshold?: number; // over_under line, e.g. 2.5
  outcomes: Outcome[];
  sport: string;
  sportKey?: string;
  matchId: string;
  startTime: number; // unix seconds, 0 when unknown
  market?: string; // source market label
}

export interface ReferenceEvent extends MarketEvent {
  numBooks: number;
  commenceTime?: string;
}

export interface ValueBet {
  sport: string;
  home: string;
  away: string;
  market: string;
  marketType: MarketType;
  threshold?: number;
  betOn: string;
  targetOdds: number;
  fairProbPct: number;
  impliedProbPct: number;
  evPercent: number;
  matchId: string;
  startTime: number;
  numBooks: number;
  commenceTime?: string;
}

export type BetStatus = "pending" | "won" | "lost" | "void";
export type SettledStatus = Exclude<BetStatus, "pending">;

export interface Bet extends ValueBet {
  betId: string;
  placedAt: number;
  stake: number;
  kellyFraction: number;
  kellyUsed: number;
  potentialReturn: number;
  status: BetStatus;
  settledAt: number | null;
  profit: number | null;
  resultInfo: string | null;
}

export interface BankrollLedger {
  initialBankroll: number;
  currentBankroll: number;
  totalStaked: number;
  totalReturned: number;
  createdAt: number;
  lastUpdated: number;
  bets: Bet[];
}

export interface BankrollConfig {
  initialBankroll: number;
  kellyMultiplier: number;
  maxStakePercent: number;
  minStake: number;
  minEvToBet: number;
  minBooksToBet: number;
  autoBet: boolean;
}

export interface KellySizing {
  kellyFull: number;
  kellyFraction: number;
  stake: number;
  kellyUsed: number;
}

export interface PlacementResult {
  placed: number;
  skipped: number;
  details: Bet[];
}

export interface PlPoint {
  timestamp: number;
  cumulativePl: number;
  bankroll: number;
  betId: string;
}

export interface BankrollSummary {
  initialBankroll: number;
  currentBankroll: number;
  totalStaked: number;
  totalReturned: number;
  totalProfit: number;
  totalBets: number;
  pendingBets: number;
  wonBets: number;
  lostBets: number;
  voidBets: number;
  winRate: number;
  roi: number;
  plHistory: PlPoint[];
  recentBets: Bet[];
  createdAt: number;
}

export interface ManualSettlementResult {
  success: boolean;
  message: string;
  summary?: BankrollSummary;
}

// =============================================
// RESULTS & SETTLEMENT
// =============================================

export type MatchStatus = "finished" | "live" | "cancelled";

export interface MatchResult {
  status: MatchStatus;
  score: string;
  winningOutcomes: string[];
}

export type ResultResolver = (
  matchId: string,
  home: string,
  away: string,
  startTime: number,
  sport: string
) => Promise<MatchResult | null>;

export type BetReportReason =
  | "not_started"
  | "in_progress"
  | "error"
  | "no_result"
  | "void"
  | "won"
  | "lost"
  | "already_settled";

export interface BetReport {
  betId: string;
  match: string;
  betOn: string;
  reason: BetReportReason;
  message: string;
}

export interface SettlementResult {
  settled: number;
  stillPending: number;
  details: Bet[];
  betReports: BetReport[];
}

// =============================================
// ACQUISITION (external collaborators)
// =============================================

export type MarketFilter = "h2h" | "over_under" | "btts" | "all";

export interface OddsSource {
  fetchTargetEvents(): Promise<MarketEvent[]>;
  fetchReferenceEvents(sportKey: string, marketFilter: MarketFilter): Promise<ReferenceEvent[]>;
}

// =============================================
// REFRESH STATE
// =============================================

export type RefreshStatus = "idle" | "loading" | "ready" | "error";

export interface RefreshLogEntry {
  time: number; // unix ms
  msg: string;
}

export interface RefreshStats {
  totalBets: number;
  totalEvents: number;
  avgEv: number;
  bySport: Record<string, number>;
  topSport: string;
}

export interface RefreshSnapshot {
  status: RefreshStatus;
  error: string | null;
  logs: RefreshLogEntry[];
  progress: number;
  lastUpdate: number; // unix ms, 0 before the first successful refresh
  valueBets: ValueBet[];
  targetEvents: MarketEvent[];
  stats: RefreshStats | null;
}
