import { InvalidStopError } from "../errors";
import type { Direction, ExitReason } from "../types";

export type SizingInput = {
	equity: number;
	riskFraction: number;
	entryPrice: number;
	stopPrice: number;
	rewardMultiple: number;
	direction: Direction;
};

export type SizedPosition = {
	positionSize: number;
	stopLoss: number;
	takeProfit: number;
	riskAmount: number;
	stopDistance: number;
};

export function sizePosition(input: SizingInput): SizedPosition {
	const { equity, riskFraction, entryPrice, stopPrice, rewardMultiple } = input;
	if (entryPrice <= 0 || stopPrice <= 0 || equity <= 0 || riskFraction <= 0) {
		throw new InvalidStopError(
			`Sizing inputs must be positive (entry=${entryPrice}, stop=${stopPrice}, equity=${equity})`,
		);
	}

	const stopDistance = Math.abs(entryPrice - stopPrice);
	if (stopDistance === 0) {
		throw new InvalidStopError(`Stop equals entry at ${entryPrice}`);
	}

	const isLong = input.direction === "long";
	if (isLong ? stopPrice > entryPrice : stopPrice < entryPrice) {
		throw new InvalidStopError(
			`Stop ${stopPrice} is on the wrong side of entry ${entryPrice} for a ${input.direction}`,
		);
	}

	const takeProfit = isLong
		? entryPrice + rewardMultiple * stopDistance
		: entryPrice - rewardMultiple * stopDistance;
	if (takeProfit <= 0) {
		throw new InvalidStopError(`Target ${takeProfit} is not a valid price`);
	}

	const riskAmount = equity * riskFraction;
	return {
		positionSize: riskAmount / stopDistance,
		stopLoss: stopPrice,
		takeProfit,
		riskAmount,
		stopDistance,
	};
}

export function realizedPnl(
	direction: Direction,
	entryPrice: number,
	exitPrice: number,
	size: number,
): { pnl: number; pnlPercent: number } {
	const diff = direction === "long" ? exitPrice - entryPrice : entryPrice - exitPrice;
	return {
		pnl: diff * Math.abs(size),
		pnlPercent: entryPrice > 0 ? (diff / entryPrice) * 100 : 0,
	};
}

/** Stop is checked first so a gap through both levels books the loss. */
export function detectExit(
	direction: Direction,
	price: number,
	stopLoss: number,
	takeProfit: number,
): Exclude<ExitReason, "manual"> | null {
	if (direction === "long") {
		if (price <= stopLoss) return "stop";
		if (price >= takeProfit) return "target";
		return null;
	}
	if (price >= stopLoss) return "stop";
	if (price <= takeProfit) return "target";
	return null;
}

export function updateWaterMarks(
	price: number,
	highWaterMark: number,
	lowWaterMark: number,
): { highWaterMark: number; lowWaterMark: number } {
	return {
		highWaterMark: Math.max(highWaterMark, price),
		lowWaterMark: Math.min(lowWaterMark, price),
	};
}

/** Maximum favourable / adverse excursion in percent of entry. */
export function excursions(
	direction: Direction,
	entryPrice: number,
	highWaterMark: number,
	lowWaterMark: number,
): { mfePercent: number; maePercent: number } {
	if (entryPrice <= 0) return { mfePercent: 0, maePercent: 0 };
	if (direction === "long") {
		return {
			mfePercent: ((highWaterMark - entryPrice) / entryPrice) * 100,
			maePercent: ((lowWaterMark - entryPrice) / entryPrice) * 100,
		};
	}
	return {
		mfePercent: ((entryPrice - lowWaterMark) / entryPrice) * 100,
		maePercent: ((entryPrice - highWaterMark) / entryPrice) * 100,
	};
}
