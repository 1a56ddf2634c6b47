import { PersistenceError, errorMessage } from "../errors";
import type { ConfidenceTier, SetupCandidate } from "../types";
import { logger } from "../utils/logger";
import type { SetupStore } from "./setupStore";

export type CachedSetup = { recordId: string; confidence: ConfidenceTier };
export type SetupCache = ReadonlyMap<string, CachedSetup>;

export type SetupWrite =
	| { action: "CREATE"; key: string; candidate: SetupCandidate }
	| {
			action: "UPDATE";
			key: string;
			recordId: string;
			candidate: SetupCandidate;
	  }
	| { action: "SKIP"; key: string; candidate: SetupCandidate };

export type RecordStats = {
	created: number;
	updated: number;
	skipped: number;
	failed: number;
};

export function setupKey(
	c: Pick<SetupCandidate, "symbol" | "timeframe" | "setupType">,
): string {
	return `${c.symbol}|${c.timeframe}|${c.setupType}`;
}

/** Decide the write for each identity. A repeated identity keeps its last occurrence. */
export function planSetupWrites(
	cache: SetupCache,
	candidates: SetupCandidate[],
): SetupWrite[] {
	const latest = new Map<string, SetupCandidate>();
	for (const candidate of candidates) {
		const key = setupKey(candidate);
		latest.delete(key);
		latest.set(key, candidate);
	}

	const writes: SetupWrite[] = [];
	for (const [key, candidate] of latest) {
		const cached = cache.get(key);
		if (!cached) {
			writes.push({ action: "CREATE", key, candidate });
		} else if (cached.confidence !== candidate.confidence) {
			writes.push({ action: "UPDATE", key, recordId: cached.recordId, candidate });
		} else {
			writes.push({ action: "SKIP", key, candidate });
		}
	}
	return writes;
}

export class SetupRecorder {
	private cache: Map<string, CachedSetup>;

	private constructor(
		private readonly store: SetupStore,
		seed: Map<string, CachedSetup>,
	) {
		this.cache = seed;
	}

	static async load(store: SetupStore): Promise<SetupRecorder> {
		const seed = new Map<string, CachedSetup>();
		try {
			for (const record of await store.listForming()) {
				seed.set(setupKey(record), {
					recordId: record.id,
					confidence: record.confidence,
				});
			}
			logger.info({ count: seed.size }, "Loaded existing setups into cache");
		} catch (error) {
			// unseeded: every identity seen this run becomes a CREATE
			logger.error(
				{ err: error, operation: "listFormingSetups" },
				"Could not seed setup cache",
			);
		}
		return new SetupRecorder(store, seed);
	}

	async record(candidates: SetupCandidate[], now: Date): Promise<RecordStats> {
		const stats: RecordStats = { created: 0, updated: 0, skipped: 0, failed: 0 };
		const timestamp = now.toISOString();

		for (const write of planSetupWrites(this.cache, candidates)) {
			const { candidate } = write;
			if (write.action === "SKIP") {
				stats.skipped += 1;
				continue;
			}

			try {
				if (write.action === "CREATE") {
					const record = await this.store.create({
						symbol: candidate.symbol,
						timeframe: candidate.timeframe,
						setupType: candidate.setupType,
						direction: candidate.direction,
						status: "FORMING",
						confidence: candidate.confidence,
						context: candidate.context,
						detectedAt: timestamp,
						updatedAt: timestamp,
					});
					this.cache.set(write.key, {
						recordId: record.id,
						confidence: record.confidence,
					});
					stats.created += 1;
				} else {
					await this.store.update(write.recordId, {
						confidence: candidate.confidence,
						direction: candidate.direction,
						context: candidate.context,
						updatedAt: timestamp,
					});
					this.cache.set(write.key, {
						recordId: write.recordId,
						confidence: candidate.confidence,
					});
					stats.updated += 1;
				}
			} catch (error) {
				stats.failed += 1;
				logger.error(
					{
						err: error,
						action: write.action,
						key: write.key,
						confidence: candidate.confidence,
						...(error instanceof PersistenceError
							? { operation: error.operation, context: error.context }
							: {}),
					},
					`Setup write failed, will retry next cycle: ${errorMessage(error)}`,
				);
			}
		}

		logger.info(stats, "Recorded setups");
		return stats;
	}
}
