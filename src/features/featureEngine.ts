import { FEATURE_SETTINGS, type FeatureSettings } from "../config/strategy";
import { DataError, InsufficientDataError } from "../errors";
import { calculateAtr, normalizedVolatility } from "../indicators/atr";
import {
	percentDistance,
	simpleMovingAverage,
} from "../indicators/movingAverage";
import type { Candle, FeatureWindow, Timeframe } from "../types";

export function requiredCandles(settings: FeatureSettings): number {
	return Math.max(
		settings.maTrend,
		settings.rangePeriod,
		settings.volatilityPeriod + 1 + settings.volatilityHistory,
	);
}

function assertWellFormed(candles: Candle[]): void {
	for (let i = 0; i < candles.length; i++) {
		const c = candles[i];
		const prices = [c.open, c.high, c.low, c.close];
		if (prices.some((p) => !Number.isFinite(p) || p <= 0)) {
			throw new DataError(`Candle ${i} has a non-positive or missing price`);
		}
		if (c.high < c.low) {
			throw new DataError(`Candle ${i} has high below low`);
		}
		if (i > 0 && c.openTime <= candles[i - 1].openTime) {
			throw new DataError(`Candle ${i} is not after the previous candle`);
		}
	}
}

/** Volatility readings for the windows ending 1..N candles before the last, oldest first. */
export function volatilityHistory(
	candles: Candle[],
	settings: FeatureSettings,
): number[] {
	const history: number[] = [];
	for (let offset = settings.volatilityHistory; offset >= 1; offset--) {
		history.push(
			normalizedVolatility(
				candles.slice(0, candles.length - offset),
				settings.volatilityPeriod,
			),
		);
	}
	return history;
}

export function mean(values: number[]): number {
	if (!values.length) return 0;
	return values.reduce((acc, val) => acc + val, 0) / values.length;
}

export function buildFeatureWindow(
	symbol: string,
	timeframe: Timeframe,
	candles: Candle[],
	settings: FeatureSettings = FEATURE_SETTINGS,
): FeatureWindow {
	const required = requiredCandles(settings);
	if (candles.length < required) {
		throw new InsufficientDataError(required, candles.length);
	}
	assertWellFormed(candles);

	const last = candles[candles.length - 1];
	const closes = candles.map((c) => c.close);
	const rangeWindow = candles.slice(-settings.rangePeriod);
	const recentHigh = Math.max(...rangeWindow.map((c) => c.high));
	const recentLow = Math.min(...rangeWindow.map((c) => c.low));

	const volatilityPct = normalizedVolatility(
		candles,
		settings.volatilityPeriod,
	);
	const history = volatilityHistory(candles, settings);
	const historyMean = mean(history);

	const maFast = simpleMovingAverage(closes, settings.maFast);
	const maSlow = simpleMovingAverage(closes, settings.maSlow);
	const maTrend = simpleMovingAverage(closes, settings.maTrend);

	return {
		features: {
			symbol,
			timeframe,
			asOf: last.closeTime,
			candleCount: candles.length,
			close: last.close,
			atr: calculateAtr(candles, settings.volatilityPeriod),
			volatilityPct,
			volatilityRatio: historyMean > 0 ? volatilityPct / historyMean : null,
			maFast,
			maSlow,
			maTrend,
			distanceFastPct: percentDistance(last.close, maFast),
			distanceSlowPct: percentDistance(last.close, maSlow),
			distanceTrendPct: percentDistance(last.close, maTrend),
			recentHigh,
			recentLow,
			distanceHighPct: (Math.abs(recentHigh - last.close) / last.close) * 100,
			distanceLowPct: (Math.abs(last.close - recentLow) / last.close) * 100,
		},
		volatilityHistory: history,
	};
}
