import { USDMClient } from "binance";
import { config } from "../config";
import type { Candle, Timeframe } from "../types";

// Public market-data endpoints only; nothing here signs or places orders.
export const restClient = new USDMClient({
	baseUrl: config.binance.baseUrl,
	beautifyResponses: true,
	disableTimeSync: true,
});

export async function fetchKlines(
	symbol: string,
	interval: Timeframe,
	limit: number,
): Promise<Candle[]> {
	const data = await restClient.getKlines({ symbol, interval, limit });

	return data.map((kline) => ({
		openTime: kline[0],
		open: Number(kline[1]),
		high: Number(kline[2]),
		low: Number(kline[3]),
		close: Number(kline[4]),
		volume: Number(kline[5]),
		closeTime: kline[6],
	}));
}

export async function fetchLatestPrice(symbol: string): Promise<number> {
	const ticker = await restClient.getSymbolPriceTicker({ symbol });
	const entry = Array.isArray(ticker)
		? ticker.find((t) => t.symbol === symbol)
		: ticker;
	if (!entry) {
		throw new Error(`No price ticker returned for ${symbol}`);
	}
	return Number(entry.price);
}
