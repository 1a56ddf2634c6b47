import crypto from "node:crypto";
import { ComputationError } from "../errors";
import type {
	Account,
	ClosedTrade,
	Decision,
	ExitReason,
	PaperState,
	Position,
} from "../types";
import {
	detectExit,
	excursions,
	realizedPnl,
	sizePosition,
	updateWaterMarks,
} from "./positionSizer";

export type PaperSettings = {
	riskFraction: number;
	rewardMultiple: number;
};

export type PriceLookup = (symbol: string) => Promise<number>;

export type PaperCycleInput = {
	decisions: Decision[];
	getPrice: PriceLookup;
	now: Date;
};

export type SkippedDecision = {
	decisionId: string;
	symbol: string;
	reason: string;
};

export type PaperCycleResult = {
	state: PaperState;
	opened: Position | null;
	closed: ClosedTrade | null;
	/** Position still open after a price check with its refreshed water marks. */
	monitored: { position: Position; price: number } | null;
	skipped: SkippedDecision[];
};

export function createAccount(initialCapital: number, now: Date): Account {
	return {
		equity: initialCapital,
		initialCapital,
		totalTrades: 0,
		winningTrades: 0,
		losingTrades: 0,
		updatedAt: now.toISOString(),
	};
}

/** Books a closed trade against the account and empties the slot it came from. */
export function settleClosedTrade(
	state: PaperState,
	trade: ClosedTrade,
): PaperState {
	const isWin = trade.pnl > 0;
	const account: Account = {
		...state.account,
		equity: state.account.equity + trade.pnl,
		totalTrades: state.account.totalTrades + 1,
		winningTrades: state.account.winningTrades + (isWin ? 1 : 0),
		losingTrades: state.account.losingTrades + (isWin ? 0 : 1),
		updatedAt: trade.closedAt,
	};
	const position =
		state.position && state.position.id !== trade.id ? state.position : null;
	return { account, position };
}

export function closePosition(
	state: PaperState,
	exitPrice: number,
	exitReason: ExitReason,
	now: Date,
): { state: PaperState; closed: ClosedTrade } {
	const position = state.position;
	if (!position) {
		throw new ComputationError("No open position to close");
	}

	const marks = updateWaterMarks(
		exitPrice,
		position.highWaterMark,
		position.lowWaterMark,
	);
	const closed: ClosedTrade = {
		...position,
		...marks,
		exitPrice,
		closedAt: now.toISOString(),
		...realizedPnl(
			position.direction,
			position.entryPrice,
			exitPrice,
			position.positionSize,
		),
		exitReason,
		...excursions(
			position.direction,
			position.entryPrice,
			marks.highWaterMark,
			marks.lowWaterMark,
		),
	};

	return { state: settleClosedTrade(state, closed), closed };
}

export function closePositionManually(
	state: PaperState,
	exitPrice: number,
	now: Date,
): { state: PaperState; closed: ClosedTrade } {
	return closePosition(state, exitPrice, "manual", now);
}

/** Forming decisions, best score first; ties keep their input order. */
export function rankQualifying(decisions: Decision[]): Decision[] {
	return decisions
		.map((decision, index) => ({ decision, index }))
		.filter(({ decision }) => decision.status === "forming")
		.sort((a, b) => b.decision.score - a.decision.score || a.index - b.index)
		.map(({ decision }) => decision);
}

export function openPosition(
	state: PaperState,
	decision: Decision,
	settings: PaperSettings,
	now: Date,
): PaperState {
	if (state.position) {
		throw new ComputationError(
			`Position already open on ${state.position.symbol}`,
		);
	}

	const sized = sizePosition({
		equity: state.account.equity,
		riskFraction: settings.riskFraction,
		entryPrice: decision.entryPrice,
		stopPrice: decision.stopPrice,
		rewardMultiple: settings.rewardMultiple,
		direction: decision.direction,
	});

	const position: Position = {
		id: crypto.randomUUID(),
		symbol: decision.symbol,
		direction: decision.direction,
		entryPrice: decision.entryPrice,
		positionSize: sized.positionSize,
		stopLoss: sized.stopLoss,
		takeProfit: sized.takeProfit,
		riskAmount: sized.riskAmount,
		equityAtOpen: state.account.equity,
		openedAt: now.toISOString(),
		setupId: decision.id,
		highWaterMark: decision.entryPrice,
		lowWaterMark: decision.entryPrice,
	};

	return { ...state, position };
}

export async function runPaperCycle(
	state: PaperState,
	input: PaperCycleInput,
	settings: PaperSettings,
): Promise<PaperCycleResult> {
	let current = state;
	let closed: ClosedTrade | null = null;
	let monitored: PaperCycleResult["monitored"] = null;

	if (current.position) {
		const position = current.position;
		const price = await input.getPrice(position.symbol);
		const exit = detectExit(
			position.direction,
			price,
			position.stopLoss,
			position.takeProfit,
		);
		if (exit) {
			const result = closePosition(current, price, exit, input.now);
			current = result.state;
			closed = result.closed;
		} else {
			const updated: Position = {
				...position,
				...updateWaterMarks(
					price,
					position.highWaterMark,
					position.lowWaterMark,
				),
			};
			current = { ...current, position: updated };
			monitored = { position: updated, price };
		}
	}

	const skipped: SkippedDecision[] = [];
	let opened: Position | null = null;

	if (!current.position) {
		for (const decision of rankQualifying(input.decisions)) {
			if (closed && decision.symbol === closed.symbol) {
				skipped.push({
					decisionId: decision.id,
					symbol: decision.symbol,
					reason: "position on this symbol closed in the same cycle",
				});
				continue;
			}
			try {
				current = openPosition(current, decision, settings, input.now);
				opened = current.position;
				break;
			} catch (error) {
				if (!(error instanceof ComputationError)) throw error;
				skipped.push({
					decisionId: decision.id,
					symbol: decision.symbol,
					reason: error.message,
				});
			}
		}
	}

	return { state: current, opened, closed, monitored, skipped };
}
