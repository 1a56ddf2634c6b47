import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors";
import { loadConfig } from "./index";

describe("loadConfig", () => {
	it("fills in defaults", () => {
		const config = loadConfig({});
		expect(config.universe).toEqual({
			symbols: ["BTCUSDT", "ETHUSDT", "SOLUSDT", "BNBUSDT", "XRPUSDT"],
			timeframes: ["4h", "1d"],
			candleLimit: 260,
		});
		expect(config.paperTrading).toEqual({
			enabled: false,
			initialCapital: 100_000,
			riskFraction: 0.01,
			rewardMultiple: 2,
		});
		expect(config.scheduling).toEqual({
			cycleCron: "*/15 * * * *",
			timezone: "UTC",
			runOnStart: true,
		});
		expect(config.paths.brainLog).toBe(
			path.resolve(process.cwd(), "data", "brain-log.ndjson"),
		);
	});

	it("parses lists and flags", () => {
		const config = loadConfig({
			SYMBOLS: " BTCUSDT , ETHUSDT ,",
			TIMEFRAMES: "15m,1h",
			PAPER_TRADING_ENABLED: "TRUE",
			PAPER_RISK_FRACTION: "0.02",
			DATA_DIR: "/tmp/radar",
		});
		expect(config.universe.symbols).toEqual(["BTCUSDT", "ETHUSDT"]);
		expect(config.universe.timeframes).toEqual(["15m", "1h"]);
		expect(config.paperTrading.enabled).toBe(true);
		expect(config.paperTrading.riskFraction).toBe(0.02);
		expect(config.paths.paperState).toBe(path.join("/tmp/radar", "paper-state.json"));
	});

	it("rejects an unknown timeframe", () => {
		expect(() => loadConfig({ TIMEFRAMES: "4h,2h" })).toThrow(ConfigError);
	});

	it("rejects a candle limit below the longest lookback", () => {
		let caught: unknown;
		try {
			loadConfig({ CANDLE_LIMIT: "100" });
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(ConfigError);
		expect(caught).toMatchObject({
			issues: ["CANDLE_LIMIT: must be at least 200 to cover the longest lookback"],
		});
	});

	it("rejects an invalid cron expression and a bad flag", () => {
		expect(() => loadConfig({ CYCLE_CRON: "every minute" })).toThrow(
			"CYCLE_CRON: Invalid cron expression",
		);
		expect(() => loadConfig({ RUN_ON_START: "maybe" })).toThrow(ConfigError);
	});
});
