import { describe, expect, it } from "vitest";
import { DataError } from "../errors";
import type { Candle, Decision, SetupCandidate, Timeframe } from "../types";
import { analyzePair, runCycle, runSimulationSafely } from "./analysisCycle";
import type { BrainLog, BrainLogEntry } from "./brainLog";

const HOUR = 60 * 60 * 1000;

/** Steady uptrend whose last three candles blow out the range. */
function breakoutCandles(count = 210): Candle[] {
	return Array.from({ length: count }, (_, i) => {
		const close = 100 + i * 0.1;
		const range = i >= count - 3 ? 30 : 1;
		return {
			openTime: i * HOUR,
			closeTime: (i + 1) * HOUR - 1,
			open: close,
			high: close + range / 2,
			low: close - range / 2,
			close,
			volume: 10,
		};
	});
}

function memoryBrainLog() {
	const entries: BrainLogEntry[] = [];
	const log: BrainLog = {
		async append(entry) {
			entries.push(entry);
		},
	};
	return { log, entries };
}

function fakeMarketData(failing: string[] = []) {
	let resets = 0;
	let requests = 0;
	return {
		resets: () => resets,
		requestsUsed: () => requests,
		loadCandles: async (symbol: string, _timeframe: Timeframe, _limit: number) => {
			requests += 1;
			if (failing.includes(symbol)) {
				throw new DataError(`No candles returned for ${symbol} 4h`);
			}
			return breakoutCandles();
		},
		resetBudget() {
			resets += 1;
		},
	};
}

function fakeRecorder() {
	const seen: SetupCandidate[][] = [];
	return {
		seen,
		async record(candidates: SetupCandidate[]) {
			seen.push(candidates);
			return { created: candidates.length, updated: 0, skipped: 0, failed: 0 };
		},
	};
}

const NOW = new Date("2024-03-01T00:00:00.000Z");

describe("analyzePair", () => {
	it("turns a breakout window into a scored decision", async () => {
		const result = await analyzePair("BTCUSDT", "4h", {
			marketData: fakeMarketData(),
			candleLimit: 210,
		});
		if ("skipped" in result) throw new Error(result.skipped);
		expect(result.candidates.map((c) => [c.setupType, c.direction, c.confidence])).toEqual([
			["volatility_expansion", "long", "HIGH"],
		]);
		expect(result.decisions).toHaveLength(1);
		expect(result.decisions[0]).toMatchObject({
			score: 55,
			status: "forming",
			buckets: ["trend_alignment", "volatility_expansion"],
		});
	});

	it("reports data failures as skips", async () => {
		const result = await analyzePair("BADUSDT", "4h", {
			marketData: fakeMarketData(["BADUSDT"]),
			candleLimit: 210,
		});
		expect(result).toEqual({
			symbol: "BADUSDT",
			timeframe: "4h",
			skipped: "No candles returned for BADUSDT 4h",
			unexpected: false,
		});
	});
});

describe("runCycle", () => {
	it("isolates failing pairs and a failing simulation", async () => {
		const { log, entries } = memoryBrainLog();
		const marketData = fakeMarketData(["BADUSDT"]);
		const recorder = fakeRecorder();
		const simulated: Decision[][] = [];

		const report = await runCycle(7, {
			symbols: ["BTCUSDT", "BADUSDT", "ETHUSDT"],
			timeframes: ["4h"],
			candleLimit: 210,
			marketData,
			recorder,
			brainLog: log,
			runPaperTrading: async (decisions) => {
				simulated.push(decisions);
				throw new Error("boom");
			},
			now: () => NOW,
		});

		expect(marketData.resets()).toBe(1);
		expect(report.stats).toEqual({
			pairs: 3,
			analyzed: 2,
			skipped: 1,
			decisions: 2,
			forming: 2,
			recorded: 2,
			errors: 1,
			requests: 3,
			paperTrading: "failed",
		});
		expect(simulated).toHaveLength(1);
		expect(simulated[0].map((d) => d.symbol)).toEqual(["BTCUSDT", "ETHUSDT"]);
		expect(recorder.seen).toHaveLength(2);

		const decisionEntries = entries.filter((e) => e.type === "decision");
		expect(decisionEntries).toHaveLength(report.stats.decisions);
		expect(entries.filter((e) => e.type === "error")).toEqual([
			{
				type: "error",
				at: NOW.toISOString(),
				context: "BADUSDT 4h",
				message: "No candles returned for BADUSDT 4h",
			},
			{
				type: "error",
				at: NOW.toISOString(),
				context: "paper_trading",
				message: "Paper trading failed: boom",
			},
		]);
		expect(entries[entries.length - 1]).toMatchObject({
			type: "cycle",
			cycle: 7,
			durationMs: 0,
		});
	});

	it("marks the simulation disabled when no runner is wired", async () => {
		const { log } = memoryBrainLog();
		const report = await runCycle(1, {
			symbols: ["BTCUSDT"],
			timeframes: ["1d"],
			candleLimit: 210,
			marketData: fakeMarketData(),
			recorder: fakeRecorder(),
			brainLog: log,
			now: () => NOW,
		});
		expect(report.stats.paperTrading).toBe("disabled");
		expect(report.stats.requests).toBe(1);
		expect(report.stats.errors).toBe(0);
	});

	it("keeps going when the brain log cannot be written", async () => {
		const failing: BrainLog = {
			append: async () => {
				throw new Error("disk full");
			},
		};
		const report = await runCycle(2, {
			symbols: ["BTCUSDT"],
			timeframes: ["4h"],
			candleLimit: 210,
			marketData: fakeMarketData(),
			recorder: fakeRecorder(),
			brainLog: failing,
			now: () => NOW,
		});
		expect(report.stats.decisions).toBe(1);
		expect(report.stats.errors).toBe(1);
	});
});

describe("runSimulationSafely", () => {
	it("reports success without logging", async () => {
		const { log, entries } = memoryBrainLog();
		await expect(runSimulationSafely(async () => 1, log, NOW)).resolves.toBe(true);
		expect(entries).toEqual([]);
	});
});
