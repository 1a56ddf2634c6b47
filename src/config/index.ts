import path from "node:path";
import dotenv from "dotenv";
import cron from "node-cron";
import { z } from "zod";
import { ConfigError } from "../errors";
import type { Timeframe } from "../types";
import { FEATURE_SETTINGS } from "./strategy";
import { requiredCandles } from "../features/featureEngine";

dotenv.config();

const TIMEFRAMES = ["15m", "1h", "4h", "1d"] as const satisfies readonly Timeframe[];

const flag = (fallback: "true" | "false") =>
	z
		.string()
		.default(fallback)
		.transform((value) => value.trim().toLowerCase())
		.pipe(z.enum(["true", "false"]))
		.transform((value) => value === "true");

const list = (fallback: string) =>
	z
		.string()
		.default(fallback)
		.transform((value) =>
			value
				.split(",")
				.map((item) => item.trim())
				.filter(Boolean),
		);

const EnvSchema = z.object({
	BINANCE_BASE_URL: z.string().url().default("https://fapi.binance.com"),
	TELEGRAM_BOT_TOKEN: z.string().default(""),
	TELEGRAM_CHAT_ID: z.string().default(""),
	SYMBOLS: list("BTCUSDT,ETHUSDT,SOLUSDT,BNBUSDT,XRPUSDT").pipe(
		z.array(z.string().regex(/^[A-Z0-9]+$/, "Symbols must be uppercase")).min(1),
	),
	TIMEFRAMES: list("4h,1d").pipe(z.array(z.enum(TIMEFRAMES)).min(1)),
	CANDLE_LIMIT: z.coerce.number().int().max(1500).default(260),
	CYCLE_CRON: z
		.string()
		.default("*/15 * * * *")
		.refine((expr) => cron.validate(expr), "Invalid cron expression"),
	CYCLE_TIMEZONE: z.string().default("UTC"),
	RUN_ON_START: flag("true"),
	PAPER_TRADING_ENABLED: flag("false"),
	PAPER_INITIAL_CAPITAL: z.coerce.number().positive().default(100_000),
	PAPER_RISK_FRACTION: z.coerce.number().positive().max(0.1).default(0.01),
	PAPER_REWARD_MULTIPLE: z.coerce.number().positive().default(2),
	MARKET_DATA_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
	MARKET_DATA_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
	MAX_REQUESTS_PER_CYCLE: z.coerce.number().int().positive().default(100),
	DATA_DIR: z.string().default("data"),
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
});

export type Config = ReturnType<typeof buildConfig>;

function buildConfig(env: z.infer<typeof EnvSchema>) {
	const dataDir = path.resolve(process.cwd(), env.DATA_DIR);
	return {
		binance: {
			baseUrl: env.BINANCE_BASE_URL,
		},
		telegram: {
			botToken: env.TELEGRAM_BOT_TOKEN,
			chatId: env.TELEGRAM_CHAT_ID,
		},
		universe: {
			symbols: env.SYMBOLS,
			timeframes: env.TIMEFRAMES,
			candleLimit: env.CANDLE_LIMIT,
		},
		marketData: {
			retries: env.MARKET_DATA_RETRIES,
			backoffMs: env.MARKET_DATA_BACKOFF_MS,
			maxRequestsPerCycle: env.MAX_REQUESTS_PER_CYCLE,
		},
		paperTrading: {
			enabled: env.PAPER_TRADING_ENABLED,
			initialCapital: env.PAPER_INITIAL_CAPITAL,
			riskFraction: env.PAPER_RISK_FRACTION,
			rewardMultiple: env.PAPER_REWARD_MULTIPLE,
		},
		scheduling: {
			cycleCron: env.CYCLE_CRON,
			timezone: env.CYCLE_TIMEZONE,
			runOnStart: env.RUN_ON_START,
		},
		logLevel: env.LOG_LEVEL,
		paths: {
			paperState: path.join(dataDir, "paper-state.json"),
			closedTrades: path.join(dataDir, "paper-closed-trades.ndjson"),
			setups: path.join(dataDir, "setups-forming.json"),
			brainLog: path.join(dataDir, "brain-log.ndjson"),
		},
	};
}

export function loadConfig(source: NodeJS.ProcessEnv): Config {
	const parsed = EnvSchema.safeParse(source);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
			),
		);
	}

	const minimum = requiredCandles(FEATURE_SETTINGS);
	if (parsed.data.CANDLE_LIMIT < minimum) {
		throw new ConfigError([
			`CANDLE_LIMIT: must be at least ${minimum} to cover the longest lookback`,
		]);
	}

	return buildConfig(parsed.data);
}

export const config = loadConfig(process.env);
