import { config, bankrollConfig, validateConfig } from "./config";
import { closeDb } from "./db/index";
import { createLedgerStore } from "./db/repositories/ledger.repo";
import { SnapshotOddsSource, SnapshotResultSource } from "./api/snapshots";
import { Ledger } from "./services/ledger.service";
import { filterValueBets, isStale, refreshState, runRefresh } from "./services/refresh.service";
import { settleBets } from "./services/settlement.service";
import type { BankrollConfig } from "./services/sports/types";
import * as consoleUI from "./utils/console-ui";
import { logger } from "./utils/logger";

const args = process.argv.slice(2);
const command = args[0] || "help";

const WATCH_CHECK_MS = 10_000;

let watchInterval: ReturnType<typeof setInterval> | null = null;

async function main() {
	console.log(`
======================================
  EV LEDGER
======================================
`);

	if (command !== "help") {
		const { valid, invalid } = validateConfig();
		if (!valid) {
			logger.error(`Invalid config: ${invalid.join(", ")}`);
			process.exit(1);
		}
	}

	switch (command) {
		case "refresh":
			await runRefreshCommand();
			break;
		case "watch":
			await runWatch();
			return;
		case "value":
			await runValue(args[1], args[2]);
			break;
		case "settle":
			await runSettle(args.includes("--force"));
			break;
		case "settle-manual":
			runSettleManual(args[1], args[2], args[3]);
			break;
		case "summary":
			runSummary();
			break;
		case "reset":
			runReset(args[1]);
			break;
		default:
			printHelp();
	}

	closeDb();
}

function openLedger(overrides: Partial<BankrollConfig> = {}): Ledger {
	const store = createLedgerStore(config.LEDGER_BACKEND, config.LEDGER_FILE);
	return new Ledger(store, { ...bankrollConfig(), ...overrides });
}

function oddsSource(): SnapshotOddsSource {
	return new SnapshotOddsSource(config.TARGET_EVENTS_FILE, config.REFERENCE_EVENTS_DIR);
}

async function runRefreshCommand() {
	const ledger = openLedger();
	const { snapshot } = await runRefresh({
		ledger,
		odds: oddsSource(),
		resolve: new SnapshotResultSource(config.RESULTS_FILE).resolver(),
		minEv: config.MIN_EV_THRESHOLD,
		marketFilter: config.MARKET_FILTER,
	});

	if (snapshot.status === "error") {
		logger.error(`Refresh failed: ${snapshot.error ?? "unknown error"}`);
		process.exitCode = 1;
		return;
	}

	logger.valueBetsSorted(snapshot.valueBets, config.MIN_EV_TO_BET);
	consoleUI.displayBankrollPanel(ledger.getSummary());
}

async function runWatch() {
	if (watchInterval) {
		return; // Already running
	}

	const ledger = openLedger();
	const odds = oddsSource();
	const resolve = new SnapshotResultSource(config.RESULTS_FILE).resolver();

	const tick = async () => {
		if (!isStale(refreshState.snapshot(), config.CACHE_DURATION)) return;

		const { started, snapshot } = await runRefresh({
			ledger,
			odds,
			resolve,
			minEv: config.MIN_EV_THRESHOLD,
			marketFilter: config.MARKET_FILTER,
		});
		if (started && snapshot.status === "ready") {
			logger.valueBetsSorted(snapshot.valueBets, config.MIN_EV_TO_BET);
		}
	};

	logger.info(`Watching snapshots (refresh every ${config.CACHE_DURATION}s)`);
	await tick();

	watchInterval = setInterval(async () => {
		try {
			await tick();
		} catch (error) {
			logger.error("Watch refresh failed", error);
		}
	}, WATCH_CHECK_MS);

	const shutdown = () => {
		logger.info("Shutting down...");
		if (watchInterval) {
			clearInterval(watchInterval);
			watchInterval = null;
		}
		closeDb();
		process.exit(0);
	};

	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);
}

async function runValue(sport?: string, minEvArg?: string) {
	const minEv = minEvArg === undefined ? undefined : parseFloat(minEvArg);
	if (minEv !== undefined && isNaN(minEv)) {
		logger.error("Invalid EV. Usage: ev-ledger value [sport|all] [minEv]");
		return;
	}

	// Detection only: nothing is placed or settled
	const { snapshot } = await runRefresh({
		ledger: openLedger({ autoBet: false }),
		odds: oddsSource(),
		minEv: config.MIN_EV_THRESHOLD,
		marketFilter: config.MARKET_FILTER,
	});

	if (snapshot.status === "error") {
		logger.error(`Detection failed: ${snapshot.error ?? "unknown error"}`);
		process.exitCode = 1;
		return;
	}

	const bets = filterValueBets(snapshot.valueBets, { sport, minEv });
	if (bets.length === 0) {
		logger.warn("No value bets match the filter");
		return;
	}

	logger.valueBetsSorted(bets, config.MIN_EV_TO_BET);
	if (snapshot.stats) {
		logger.info(
			`${snapshot.stats.totalBets} value bets across ${snapshot.stats.totalEvents} events (avg EV ${snapshot.stats.avgEv.toFixed(2)}%, top sport: ${snapshot.stats.topSport})`,
		);
	}
}

async function runSettle(force: boolean) {
	const ledger = openLedger();
	const resolver = new SnapshotResultSource(config.RESULTS_FILE).resolver();

	logger.info(`Checking pending bets${force ? " (forced)" : ""}...`);
	const result = await settleBets(ledger, resolver, { force });

	logger.info(`Settled ${result.settled} bets, ${result.stillPending} still pending`);
	consoleUI.displayBetReports(result.betReports);
	if (result.settled > 0) {
		consoleUI.displayBankrollPanel(ledger.getSummary());
	}
}

function runSettleManual(betId?: string, outcome?: string, score?: string) {
	if (!betId || !outcome) {
		logger.error("Usage: ev-ledger settle-manual <bet-id> <won|lost|void> [score]");
		return;
	}

	const result = openLedger().settleManually(betId, outcome, score);
	if (result.success) {
		logger.success(result.message);
		if (result.summary) consoleUI.displayBankrollPanel(result.summary);
	} else {
		logger.error(result.message);
		process.exitCode = 1;
	}
}

function runSummary() {
	const summary = openLedger().getSummary();
	consoleUI.displayBankrollPanel(summary);
	consoleUI.displayBets(summary.recentBets);
}

function runReset(amountArg?: string) {
	const amount = amountArg === undefined ? config.BANKROLL_INITIAL : parseFloat(amountArg);
	if (isNaN(amount) || amount <= 0) {
		logger.error("Invalid amount. Usage: ev-ledger reset [amount]");
		return;
	}

	const summary = openLedger().reset(amount);
	logger.success(`Bankroll reset to ${consoleUI.formatCurrency(summary.currentBankroll)}`);
}

function printHelp() {
	console.log(`
USAGE: ev-ledger <command>

COMMANDS:
  refresh                         Detect value bets, settle finished bets, place new ones
  watch                           Refresh whenever the cached results go stale
  value [sport|all] [minEv]       List current value bets without placing them
  settle [--force]                Settle pending bets (--force prints a line per bet)
  settle-manual <id> <result>     Settle one bet by hand (won, lost or void) [score]
  summary                         Show bankroll, P/L and recent bets
  reset [amount]                  Start a fresh bankroll (default BANKROLL_INITIAL)
  help                            Show this help message

EXAMPLES:
  ev-ledger refresh
  ev-ledger value soccer_epl 2
  ev-ledger settle --force
  ev-ledger settle-manual 3f9a1c2b4d5e won 2-1
  ev-ledger reset 250

ENVIRONMENT:
  LEDGER_BACKEND=sqlite|file   DB_PATH, LEDGER_FILE
  TARGET_EVENTS_FILE, REFERENCE_EVENTS_DIR, RESULTS_FILE
  BANKROLL_INITIAL, KELLY_FRACTION, MAX_STAKE_PERCENT, MIN_STAKE
  MIN_EV_TO_BET, MIN_BOOKS_TO_BET, AUTO_BET, MIN_EV_THRESHOLD, MARKET_FILTER, CACHE_DURATION
`);
}

main().catch((error) => {
	logger.error("Fatal error", error);
	process.exit(1);
});
