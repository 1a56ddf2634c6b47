import { describe, expect, it } from "vitest";
import type { Candle } from "../types";
import { calculateAtr, normalizedVolatility, trueRanges } from "./atr";
import { percentDistance, simpleMovingAverage } from "./movingAverage";

function bar(high: number, low: number, close: number): Candle {
	return { openTime: 0, closeTime: 0, open: close, high, low, close, volume: 0 };
}

describe("indicators", () => {
	it("takes the widest of the three true-range legs", () => {
		const candles = [bar(11, 9, 10), bar(12, 11, 11.5), bar(10, 8, 9), bar(15, 14, 14)];
		// intrabar, gap down from 11.5, gap up from 9
		expect(trueRanges(candles)).toEqual([2, 3.5, 6]);
		expect(calculateAtr(candles, 3)).toBeCloseTo(11.5 / 3, 10);
		expect(calculateAtr(candles, 2)).toBeCloseTo(4.75, 10);
	});

	it("normalizes true range by each close", () => {
		const candles = [bar(101, 99, 100), bar(101, 99, 100), bar(202, 198, 200)];
		// 2/100 and 102/200
		expect(normalizedVolatility(candles, 2)).toBeCloseTo(((0.02 + 0.51) / 2) * 100, 10);
		expect(() => normalizedVolatility(candles, 3)).toThrow("volatility(3)");
	});

	it("averages the most recent values", () => {
		expect(simpleMovingAverage([1, 2, 3, 4, 5], 2)).toBe(4.5);
		expect(() => simpleMovingAverage([1, 2], 3)).toThrow("SMA(3)");
		expect(percentDistance(110, 100)).toBeCloseTo(10, 10);
		expect(percentDistance(90, 100)).toBeCloseTo(-10, 10);
	});
});
