import { fetchKlines, fetchLatestPrice } from "../clients/binance";
import { DataError } from "../errors";
import type { Candle, Timeframe } from "../types";
import { withRetry } from "../utils/retry";

export type CandleSource = (
	symbol: string,
	timeframe: Timeframe,
	limit: number,
) => Promise<Candle[]>;

export type PriceSource = (symbol: string) => Promise<number>;

export type MarketDataOptions = {
	retries: number;
	backoffMs: number;
	maxRequestsPerCycle: number;
	fetchCandles?: CandleSource;
	fetchPrice?: PriceSource;
	wait?: (ms: number) => Promise<void>;
};

export interface MarketData {
	loadCandles: CandleSource;
	latestPrice: PriceSource;
	/** Starts a new per-cycle request budget. */
	resetBudget(): void;
	requestsUsed(): number;
}

export function createMarketData(options: MarketDataOptions): MarketData {
	const fetchCandles = options.fetchCandles ?? fetchKlines;
	const fetchPrice = options.fetchPrice ?? fetchLatestPrice;
	let used = 0;

	function spend(label: string): void {
		if (used >= options.maxRequestsPerCycle) {
			throw new DataError(
				`Request budget of ${options.maxRequestsPerCycle} exhausted before ${label}`,
			);
		}
		used += 1;
	}

	return {
		async loadCandles(symbol, timeframe, limit) {
			const label = `klines ${symbol} ${timeframe}`;
			spend(label);
			const candles = await withRetry(
				() => fetchCandles(symbol, timeframe, limit),
				{ retries: options.retries, backoffMs: options.backoffMs, label, wait: options.wait },
			);
			if (!candles.length) {
				throw new DataError(`No candles returned for ${symbol} ${timeframe}`);
			}
			return [...candles].sort((a, b) => a.openTime - b.openTime);
		},
		async latestPrice(symbol) {
			const label = `price ${symbol}`;
			spend(label);
			const price = await withRetry(() => fetchPrice(symbol), {
				retries: options.retries,
				backoffMs: options.backoffMs,
				label,
				wait: options.wait,
			});
			if (!Number.isFinite(price) || price <= 0) {
				throw new DataError(`Invalid price ${price} for ${symbol}`);
			}
			return price;
		},
		resetBudget() {
			used = 0;
		},
		requestsUsed: () => used,
	};
}
