import type { Candle } from "../types";

/** True range of each candle after the first, using the previous close. */
export function trueRanges(candles: Candle[]): number[] {
	const ranges: number[] = [];
	for (let i = 1; i < candles.length; i++) {
		const prev = candles[i - 1];
		const curr = candles[i];
		ranges.push(
			Math.max(
				curr.high - curr.low,
				Math.abs(curr.high - prev.close),
				Math.abs(curr.low - prev.close),
			),
		);
	}
	return ranges;
}

export function calculateAtr(candles: Candle[], period: number): number {
	if (candles.length < period + 1) {
		throw new Error(`Not enough candles to calculate ATR(${period})`);
	}

	const recent = trueRanges(candles.slice(-(period + 1)));
	return recent.reduce((acc, val) => acc + val, 0) / period;
}

/** Mean of true range / close over the last `period` candles, in percent. */
export function normalizedVolatility(candles: Candle[], period: number): number {
	if (candles.length < period + 1) {
		throw new Error(`Not enough candles to calculate volatility(${period})`);
	}

	const window = candles.slice(-(period + 1));
	const ranges = trueRanges(window);
	let sum = 0;
	for (let i = 0; i < ranges.length; i++) {
		sum += ranges[i] / window[i + 1].close;
	}
	return (sum / period) * 100;
}
