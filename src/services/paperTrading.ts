import type { Notifier } from "../clients/telegram";
import {
	closePositionManually,
	createAccount,
	type PaperCycleResult,
	type PaperSettings,
	runPaperCycle,
	settleClosedTrade,
} from "../trading/paperEngine";
import type { ClosedTrade, Decision, PaperState, Position } from "../types";
import { logger } from "../utils/logger";
import type { TradeStore } from "./tradeStore";

export type PaperTradingDeps = {
	store: TradeStore;
	latestPrice: (symbol: string) => Promise<number>;
	notify: Notifier;
	settings: PaperSettings & { initialCapital: number };
	now?: () => Date;
};

export type LoadedState = {
	state: PaperState;
	/** True when the stored document is stale and must be written back. */
	dirty: boolean;
};

/**
 * Reads the ledger state, creating the account on first use. An open position
 * whose id is already in the closed-trade ledger was closed by a cycle that
 * failed before committing; it is settled from the ledger row.
 */
export async function loadPaperState(
	store: TradeStore,
	initialCapital: number,
	now: Date,
): Promise<LoadedState> {
	const stored = await store.loadState();
	if (!stored) {
		logger.info({ initialCapital }, "Created paper account");
		return {
			state: { account: createAccount(initialCapital, now), position: null },
			dirty: true,
		};
	}

	if (stored.position) {
		const booked = await store.findClosedTrade(stored.position.id);
		if (booked) {
			logger.warn(
				{ positionId: booked.id, symbol: booked.symbol, pnl: booked.pnl },
				"Settling close found in ledger but missing from account",
			);
			return { state: settleClosedTrade(stored, booked), dirty: true };
		}
	}
	return { state: stored, dirty: false };
}

function formatOpened(position: Position): string {
	return [
		`Paper trade opened ${position.symbol} (${position.direction})`,
		`Entry: ${position.entryPrice}`,
		`Size: ${position.positionSize.toFixed(4)}`,
		`SL: ${position.stopLoss} | TP: ${position.takeProfit}`,
		`Risk: ${position.riskAmount.toFixed(2)}`,
	].join("\n");
}

function formatClosed(trade: ClosedTrade, equity: number): string {
	return [
		`Paper trade closed ${trade.symbol} (${trade.direction})`,
		`Entry: ${trade.entryPrice} | Exit: ${trade.exitPrice}`,
		`PnL: ${trade.pnl.toFixed(2)} (${trade.pnlPercent.toFixed(2)}%)`,
		`Reason: ${trade.exitReason}`,
		`Equity: ${equity.toFixed(2)}`,
	].join("\n");
}

// Ledger first: a failed state write leaves the trade findable for the next load.
async function commit(
	store: TradeStore,
	state: PaperState,
	closed: ClosedTrade | null,
): Promise<void> {
	if (closed) {
		await store.appendClosedTrade(closed);
	}
	await store.saveState(state);
}

/** Loads the ledger, advances it by one cycle and writes back what changed. */
export async function runPaperTrading(
	decisions: Decision[],
	deps: PaperTradingDeps,
): Promise<PaperCycleResult> {
	const now = (deps.now ?? (() => new Date()))();
	const { state, dirty } = await loadPaperState(
		deps.store,
		deps.settings.initialCapital,
		now,
	);

	logger.info(
		{
			equity: state.account.equity,
			totalTrades: state.account.totalTrades,
			winningTrades: state.account.winningTrades,
			losingTrades: state.account.losingTrades,
			openPosition: state.position?.symbol ?? null,
		},
		"Paper trading cycle",
	);

	const result = await runPaperCycle(
		state,
		{ decisions, getPrice: deps.latestPrice, now },
		deps.settings,
	);
	if (dirty || result.closed || result.opened || result.monitored) {
		await commit(deps.store, result.state, result.closed);
	}

	for (const skip of result.skipped) {
		logger.warn(skip, "Skipped qualifying decision");
	}
	if (result.monitored) {
		logger.info(
			{
				symbol: result.monitored.position.symbol,
				price: result.monitored.price,
				stopLoss: result.monitored.position.stopLoss,
				takeProfit: result.monitored.position.takeProfit,
			},
			"Monitoring paper position",
		);
	}
	if (result.closed) {
		logger.info(
			{
				symbol: result.closed.symbol,
				exitReason: result.closed.exitReason,
				pnl: result.closed.pnl,
				equity: result.state.account.equity,
			},
			"Closed paper position",
		);
		await deps.notify(formatClosed(result.closed, result.state.account.equity));
	}
	if (result.opened) {
		logger.info(
			{
				symbol: result.opened.symbol,
				direction: result.opened.direction,
				entry: result.opened.entryPrice,
				size: result.opened.positionSize,
			},
			"Opened paper position",
		);
		await deps.notify(formatOpened(result.opened));
	}

	return result;
}

/** Closes the open paper position at the latest price. Returns null when the slot is empty. */
export async function closePaperPosition(
	deps: Omit<PaperTradingDeps, "settings"> & { initialCapital: number },
): Promise<ClosedTrade | null> {
	const now = (deps.now ?? (() => new Date()))();
	const { state, dirty } = await loadPaperState(
		deps.store,
		deps.initialCapital,
		now,
	);
	if (!state.position) {
		if (dirty) await deps.store.saveState(state);
		logger.info("No open paper position to close");
		return null;
	}

	const price = await deps.latestPrice(state.position.symbol);
	const { state: next, closed } = closePositionManually(state, price, now);
	await commit(deps.store, next, closed);

	logger.info(
		{ symbol: closed.symbol, exitPrice: price, pnl: closed.pnl },
		"Closed paper position manually",
	);
	await deps.notify(formatClosed(closed, next.account.equity));
	return closed;
}
