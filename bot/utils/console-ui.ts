/**
 * Console rendering of the paper bankroll
 * Uses ANSI color codes for colorful terminal output
 */

import type { BankrollSummary, Bet, BetReport, PlPoint } from "../services/sports/types";

// ANSI color codes
const colors = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
};

export function formatCurrency(value: number): string {
  const sign = value < 0 ? "-" : "";
  const abs = Math.abs(value);
  if (abs >= 1000000) {
    return `${sign}${(abs / 1000000).toFixed(2)}M`;
  }
  if (abs >= 1000) {
    return `${sign}${(abs / 1000).toFixed(2)}K`;
  }
  return `${sign}${abs.toFixed(2)}`;
}

function signed(value: number): string {
  return `${value >= 0 ? "+" : ""}${formatCurrency(value)}`;
}

/**
 * ASCII graph of the bankroll after each settled bet
 */
export function displayPlGraph(history: PlPoint[], width: number = 50): void {
  if (history.length === 0) {
    console.log(`${colors.dim}  No settled bets yet${colors.reset}`);
    return;
  }

  const values = history.map((h) => h.bankroll);
  const minVal = Math.min(...values);
  const maxVal = Math.max(...values);
  const range = maxVal - minVal || 1;

  const chars = ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"];

  let graphLine = "";
  const step = Math.max(1, Math.floor(history.length / width));

  for (let i = 0; i < width && i * step < history.length; i++) {
    const entry = history[Math.min(i * step, history.length - 1)];
    if (!entry) continue;
    const normalized = (entry.bankroll - minVal) / range;
    const charIdx = Math.floor(normalized * (chars.length - 1));
    const charColor = entry.cumulativePl >= 0 ? colors.green : colors.red;
    graphLine += `${charColor}${chars[charIdx]}${colors.reset}`;
  }

  console.log(`\n${colors.cyan}  Bankroll History${colors.reset}`);
  console.log(`${colors.dim}  ${maxVal.toFixed(2).padStart(9)}${colors.reset} ┤`);
  console.log(`             ${graphLine}`);
  console.log(`${colors.dim}  ${minVal.toFixed(2).padStart(9)}${colors.reset} ┤`);

  const firstEntry = history[0];
  const lastEntry = history[history.length - 1];
  if (firstEntry && lastEntry) {
    const startDate = new Date(firstEntry.timestamp * 1000).toLocaleDateString("en-US", { month: "short", day: "numeric" });
    const endDate = new Date(lastEntry.timestamp * 1000).toLocaleDateString("en-US", { month: "short", day: "numeric" });
    console.log(`${colors.dim}             ${startDate.padEnd(width / 2)}${endDate.padStart(width / 2)}${colors.reset}`);
  }
}

/**
 * Bankroll summary panel
 */
export function displayBankrollPanel(summary: BankrollSummary): void {
  const profitColor = summary.totalProfit >= 0 ? colors.green : colors.red;
  const row = (label: string, value: string) =>
    console.log(`${colors.magenta}║${colors.reset}  ${colors.dim}${label.padEnd(16)}${colors.reset}${value}`);

  console.log(`\n${colors.bright}${colors.magenta}╔═══════════════════════════════════════════════════════════╗${colors.reset}`);
  console.log(`${colors.magenta}║${colors.reset}  ${colors.bright}PAPER BANKROLL${colors.reset}`);
  console.log(`${colors.magenta}╠═══════════════════════════════════════════════════════════╣${colors.reset}`);

  row("Bankroll:", `${colors.bright}${colors.white}${formatCurrency(summary.currentBankroll)}${colors.reset} ${colors.dim}(started at ${formatCurrency(summary.initialBankroll)})${colors.reset}`);
  row("Profit:", `${profitColor}${signed(summary.totalProfit)} (ROI ${summary.roi.toFixed(1)}%)${colors.reset}`);
  row("Staked:", `${formatCurrency(summary.totalStaked)}  ${colors.dim}Returned:${colors.reset} ${formatCurrency(summary.totalReturned)}`);
  row(
    "Bets:",
    `${colors.cyan}${summary.totalBets}${colors.reset}  ` +
      `${colors.yellow}${summary.pendingBets} pending${colors.reset}  ` +
      `${colors.green}${summary.wonBets} won${colors.reset}  ` +
      `${colors.red}${summary.lostBets} lost${colors.reset}  ` +
      `${colors.dim}${summary.voidBets} void${colors.reset}`
  );
  row("Win rate:", `${summary.winRate.toFixed(1)}%`);

  console.log(`${colors.magenta}╚═══════════════════════════════════════════════════════════╝${colors.reset}`);

  if (summary.plHistory.length > 1) {
    displayPlGraph(summary.plHistory);
  }
}

function statusBadge(bet: Bet): string {
  switch (bet.status) {
    case "won":
      return `${colors.green}✓ WON ${signed(bet.profit ?? 0)}${colors.reset}`;
    case "lost":
      return `${colors.red}✗ LOST ${signed(bet.profit ?? 0)}${colors.reset}`;
    case "void":
      return `${colors.dim}○ VOID${colors.reset}`;
    case "pending":
      return `${colors.yellow}… PENDING${colors.reset}`;
  }
}

export function displayBet(bet: Bet): void {
  const match = `${bet.home} vs ${bet.away}`;
  const title = match.length > 35 ? match.slice(0, 32) + "..." : match;

  console.log(
    `  ${statusBadge(bet)} ${colors.white}${title}${colors.reset} ` +
      `${colors.yellow}[${bet.betOn} @ ${bet.targetOdds.toFixed(2)}]${colors.reset} ` +
      `${colors.dim}${bet.betId}${colors.reset}`
  );
  console.log(
    `    ${colors.dim}Stake:${colors.reset} ${formatCurrency(bet.stake)}  ` +
      `${colors.dim}EV:${colors.reset} +${bet.evPercent.toFixed(2)}%  ` +
      `${colors.dim}Fair:${colors.reset} ${bet.fairProbPct.toFixed(1)}%  ` +
      `${colors.dim}Market:${colors.reset} ${bet.market}` +
      (bet.resultInfo ? `  ${colors.dim}Result:${colors.reset} ${bet.resultInfo}` : "")
  );
}

export function displayBets(bets: Bet[], limit: number = 10): void {
  if (bets.length === 0) {
    console.log(`${colors.dim}  No bets placed${colors.reset}`);
    return;
  }

  console.log(`\n${colors.cyan}  Recent Bets (${bets.length})${colors.reset}`);
  console.log(`${colors.dim}  ───────────────────────────────────────────────────────${colors.reset}`);
  for (const bet of bets.slice(0, limit)) {
    displayBet(bet);
  }
  if (bets.length > limit) {
    console.log(`${colors.dim}    ...and ${bets.length - limit} more${colors.reset}`);
  }
}

const REPORT_COLORS: Record<BetReport["reason"], string> = {
  won: colors.green,
  lost: colors.red,
  void: colors.dim,
  not_started: colors.cyan,
  in_progress: colors.yellow,
  no_result: colors.yellow,
  error: colors.red,
  already_settled: colors.dim,
};

/**
 * Per-bet settlement report (forced settlement runs)
 */
export function displayBetReports(reports: BetReport[]): void {
  if (reports.length === 0) return;

  console.log(`\n${colors.cyan}  Settlement Report${colors.reset}`);
  for (const report of reports) {
    const color = REPORT_COLORS[report.reason];
    console.log(
      `  ${color}${report.reason.toUpperCase().padEnd(16)}${colors.reset} ` +
        `${report.match} ${colors.dim}[${report.betOn}]${colors.reset} ${report.message}`
    );
  }
}
