import type { ValueBet } from "../services/sports/types";

type LogLevel = "info" | "warn" | "error" | "debug" | "success";

const colors = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
  success: "\x1b[32m", // green
  reset: "\x1b[0m",
};

function timestamp(): string {
  const parts = new Date().toISOString().split("T");
  return (parts[1] || "00:00:00").slice(0, 8);
}

function log(level: LogLevel, message: string, data?: unknown) {
  const color = colors[level];
  const prefix = `${colors.debug}[${timestamp()}]${colors.reset} ${color}[${level.toUpperCase()}]${colors.reset}`;

  if (data !== undefined) {
    console.log(prefix, message, data);
  } else {
    console.log(prefix, message);
  }
}

function evColor(evPercent: number, minEv: number): { color: string; symbol: string } {
  if (evPercent >= minEv) return { color: colors.success, symbol: "✓" };
  if (evPercent > 0) return { color: colors.warn, symbol: "○" };
  return { color: colors.error, symbol: "✗" };
}

function formatKickoff(startTime: number, nowMs: number): string {
  if (startTime <= 0) return `${colors.debug}--${colors.reset}`;

  const diffMs = startTime * 1000 - nowMs;
  const diffMins = Math.abs(diffMs) / 60000;
  const hours = Math.floor(diffMins / 60);
  const mins = Math.round(diffMins % 60);
  const span = diffMins >= 60 ? `${hours}h${mins}m` : `${Math.round(diffMins)}m`;

  if (diffMs > 0) {
    return diffMins >= 60 ? `${colors.info}in ${span}${colors.reset}` : `${colors.warn}in ${span}${colors.reset}`;
  }
  return `${colors.success}LIVE ${span}${colors.reset}`;
}

export const logger = {
  info: (msg: string, data?: unknown) => log("info", msg, data),
  warn: (msg: string, data?: unknown) => log("warn", msg, data),
  error: (msg: string, data?: unknown) => log("error", msg, data),
  debug: (msg: string, data?: unknown) => log("debug", msg, data),
  success: (msg: string, data?: unknown) => log("success", msg, data),

  // Value bets sorted by kick-off (soonest first)
  valueBetsSorted: (bets: ValueBet[], minEv: number = 0) => {
    if (bets.length === 0) return;

    const now = Date.now();
    const sorted = [...bets].sort((a, b) => a.startTime - b.startTime);

    console.log(`${colors.debug}[${timestamp()}]${colors.reset} --- Value Bet Report (${sorted.length} selections) ---`);

    for (const bet of sorted) {
      const { color, symbol } = evColor(bet.evPercent, minEv);
      const sign = bet.evPercent >= 0 ? "+" : "";
      const gameLabel = `${bet.home} vs ${bet.away}`.substring(0, 35).padEnd(35);
      const selection = `${bet.betOn} @ ${bet.targetOdds.toFixed(2)}`.padEnd(25);
      console.log(
        `${colors.debug}[${timestamp()}]${colors.reset} ${symbol} ${formatKickoff(bet.startTime, now).padEnd(20)} ${gameLabel} ${selection} ${color}${sign}${bet.evPercent.toFixed(2)}%${colors.reset} ${colors.debug}(${bet.numBooks} books)${colors.reset}`
      );
    }
    console.log(`${colors.debug}[${timestamp()}]${colors.reset} --- End Value Bet Report ---`);
  },
};
