import cron from "node-cron";
import { notify } from "./clients/telegram";
import { config } from "./config";
import { createFileBrainLog } from "./services/brainLog";
import { type CycleDeps, runCycle } from "./services/analysisCycle";
import { createMarketData } from "./services/marketData";
import { closePaperPosition, runPaperTrading } from "./services/paperTrading";
import { SetupRecorder } from "./services/setupRecorder";
import { createFileSetupStore } from "./services/setupStore";
import { createFileTradeStore } from "./services/tradeStore";
import { logger } from "./utils/logger";

async function buildDeps(): Promise<CycleDeps> {
	const marketData = createMarketData(config.marketData);
	const recorder = await SetupRecorder.load(
		createFileSetupStore(config.paths.setups),
	);
	const tradeStore = createFileTradeStore(config.paths);

	return {
		symbols: config.universe.symbols,
		timeframes: config.universe.timeframes,
		candleLimit: config.universe.candleLimit,
		marketData,
		recorder,
		brainLog: createFileBrainLog(config.paths.brainLog),
		runPaperTrading: config.paperTrading.enabled
			? (decisions) =>
					runPaperTrading(decisions, {
						store: tradeStore,
						latestPrice: marketData.latestPrice,
						notify,
						settings: config.paperTrading,
					})
			: undefined,
	};
}

function scheduleCycles(deps: CycleDeps): void {
	let cycle = 0;
	let running = false;

	const tick = async () => {
		if (running) {
			logger.warn({ cycle }, "Previous cycle still running, skipping tick");
			return;
		}
		running = true;
		cycle += 1;
		try {
			const report = await runCycle(cycle, deps);
			if (report.stats.forming > 0) {
				await notify(
					`Cycle ${cycle}: ${report.stats.forming} forming setup(s) of ${report.stats.decisions}`,
				);
			}
		} catch (error) {
			logger.error({ err: error, cycle }, "Analysis cycle failed");
			await notify(`Cycle ${cycle} failed: ${String(error)}`);
		} finally {
			running = false;
		}
	};

	cron.schedule(config.scheduling.cycleCron, tick, {
		timezone: config.scheduling.timezone,
	});

	if (config.scheduling.runOnStart) {
		tick().catch((err) => logger.error({ err }, "Initial cycle failed"));
	}
}

async function bootstrap() {
	logger.info(
		{
			symbols: config.universe.symbols,
			timeframes: config.universe.timeframes,
			paperTrading: config.paperTrading.enabled,
			cron: config.scheduling.cycleCron,
		},
		"Starting setup radar",
	);
	const deps = await buildDeps();
	await deps.brainLog
		.append({
			type: "startup",
			at: new Date().toISOString(),
			symbols: deps.symbols,
			timeframes: deps.timeframes,
		})
		.catch((err) => logger.error({ err }, "Failed to write startup log"));
	scheduleCycles(deps);
}

async function closePosition() {
	const closed = await closePaperPosition({
		store: createFileTradeStore(config.paths),
		latestPrice: createMarketData(config.marketData).latestPrice,
		notify,
		initialCapital: config.paperTrading.initialCapital,
	});
	logger.info(
		{ positionId: closed?.id ?? null, pnl: closed?.pnl ?? null },
		"Manual close finished",
	);
}

const command = process.argv[2] === "close-position" ? closePosition : bootstrap;

command().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
