import { from, lastValueFrom } from "rxjs";
import { concatMap, toArray } from "rxjs/operators";
import { DataError, SimulationError, errorMessage } from "../errors";
import { buildFeatureWindow } from "../features/featureEngine";
import { detectSetups } from "../patterns/setupRules";
import { makeDecisions } from "../scoring/decisionEngine";
import type { Decision, SetupCandidate, Timeframe } from "../types";
import { logger } from "../utils/logger";
import { type BrainLog, type CycleStats, decisionEntry } from "./brainLog";
import type { MarketData } from "./marketData";
import type { RecordStats } from "./setupRecorder";

export type CycleDeps = {
	symbols: string[];
	timeframes: Timeframe[];
	candleLimit: number;
	marketData: Pick<MarketData, "loadCandles" | "resetBudget" | "requestsUsed">;
	recorder: { record(candidates: SetupCandidate[], now: Date): Promise<RecordStats> };
	brainLog: BrainLog;
	/** Absent when paper trading is switched off. */
	runPaperTrading?: (decisions: Decision[]) => Promise<unknown>;
	now?: () => Date;
};

export type PairResult =
	| {
			symbol: string;
			timeframe: Timeframe;
			candidates: SetupCandidate[];
			decisions: Decision[];
	  }
	| { symbol: string; timeframe: Timeframe; skipped: string; unexpected: boolean };

export type CycleReport = {
	cycle: number;
	stats: CycleStats;
	decisions: Decision[];
};

export async function analyzePair(
	symbol: string,
	timeframe: Timeframe,
	deps: Pick<CycleDeps, "marketData" | "candleLimit">,
): Promise<PairResult> {
	try {
		const candles = await deps.marketData.loadCandles(
			symbol,
			timeframe,
			deps.candleLimit,
		);
		const { features, volatilityHistory } = buildFeatureWindow(
			symbol,
			timeframe,
			candles,
		);
		const candidates = detectSetups(features, volatilityHistory);
		const decisions = makeDecisions(candidates, features);
		logger.info(
			{
				symbol,
				timeframe,
				candles: candles.length,
				volatilityPct: features.volatilityPct,
				setups: candidates.map((c) => c.setupType),
			},
			"Analyzed pair",
		);
		return { symbol, timeframe, candidates, decisions };
	} catch (error) {
		const unexpected = !(error instanceof DataError);
		logger[unexpected ? "error" : "warn"](
			{ symbol, timeframe, err: error },
			"Skipping pair for this cycle",
		);
		return { symbol, timeframe, skipped: errorMessage(error), unexpected };
	}
}

async function safeAppend(
	brainLog: BrainLog,
	entry: Parameters<BrainLog["append"]>[0],
): Promise<boolean> {
	try {
		await brainLog.append(entry);
		return true;
	} catch (error) {
		logger.error({ err: error, entryType: entry.type }, "Brain log write failed");
		return false;
	}
}

/** Failure boundary around the simulation: faults are logged, never rethrown. */
export async function runSimulationSafely(
	run: () => Promise<unknown>,
	brainLog: BrainLog,
	now: Date,
): Promise<boolean> {
	try {
		await run();
		return true;
	} catch (cause) {
		const error =
			cause instanceof SimulationError
				? cause
				: new SimulationError(`Paper trading failed: ${errorMessage(cause)}`, {
						cause,
					});
		logger.error({ err: error }, "Paper trading failed (non-fatal)");
		await safeAppend(brainLog, {
			type: "error",
			at: now.toISOString(),
			context: "paper_trading",
			message: error.message,
		});
		return false;
	}
}

export async function runCycle(
	cycle: number,
	deps: CycleDeps,
): Promise<CycleReport> {
	const clock = deps.now ?? (() => new Date());
	const startedAt = clock();
	deps.marketData.resetBudget();

	const pairs = deps.symbols.flatMap((symbol) =>
		deps.timeframes.map((timeframe) => ({ symbol, timeframe })),
	);
	logger.info({ cycle, pairs: pairs.length }, "Starting analysis cycle");

	const stats: CycleStats = {
		pairs: pairs.length,
		analyzed: 0,
		skipped: 0,
		decisions: 0,
		forming: 0,
		recorded: 0,
		errors: 0,
		requests: 0,
		paperTrading: deps.runPaperTrading ? "ok" : "disabled",
	};

	// one pair at a time, in universe order
	const results = await lastValueFrom(
		from(pairs).pipe(
			concatMap(({ symbol, timeframe }) => analyzePair(symbol, timeframe, deps)),
			toArray(),
		),
	);

	const decisions: Decision[] = [];
	for (const result of results) {
		const at = clock();
		if ("skipped" in result) {
			stats.skipped += 1;
			if (result.unexpected) stats.errors += 1;
			await safeAppend(deps.brainLog, {
				type: "error",
				at: at.toISOString(),
				context: `${result.symbol} ${result.timeframe}`,
				message: result.skipped,
			});
			continue;
		}

		stats.analyzed += 1;
		for (const decision of result.decisions) {
			decisions.push(decision);
			stats.decisions += 1;
			if (decision.status === "forming") stats.forming += 1;
			if (!(await safeAppend(deps.brainLog, decisionEntry(decision, at)))) {
				stats.errors += 1;
			}
		}

		try {
			const recorded = await deps.recorder.record(result.candidates, at);
			stats.recorded += recorded.created + recorded.updated;
			stats.errors += recorded.failed;
		} catch (error) {
			stats.errors += 1;
			logger.error(
				{ err: error, symbol: result.symbol, timeframe: result.timeframe },
				"Setup recording failed",
			);
		}
	}

	const simulate = deps.runPaperTrading;
	if (simulate) {
		const ok = await runSimulationSafely(
			() => simulate(decisions),
			deps.brainLog,
			clock(),
		);
		if (!ok) {
			stats.paperTrading = "failed";
			stats.errors += 1;
		}
	}

	stats.requests = deps.marketData.requestsUsed();
	const finishedAt = clock();
	await safeAppend(deps.brainLog, {
		type: "cycle",
		at: finishedAt.toISOString(),
		cycle,
		durationMs: finishedAt.getTime() - startedAt.getTime(),
		stats,
	});
	logger.info({ cycle, ...stats }, "Finished analysis cycle");

	return { cycle, stats, decisions };
}
