import { PersistenceError } from "../errors";
import type { Decision } from "../types";
import { appendLine } from "../utils/storage";

export type CycleStats = {
	pairs: number;
	analyzed: number;
	skipped: number;
	decisions: number;
	forming: number;
	recorded: number;
	errors: number;
	/** Market-data requests spent against the per-cycle budget. */
	requests: number;
	paperTrading: "disabled" | "ok" | "failed";
};

export type BrainLogEntry =
	| { type: "startup"; at: string; symbols: string[]; timeframes: string[] }
	| { type: "cycle"; at: string; cycle: number; durationMs: number; stats: CycleStats }
	| {
			type: "decision";
			at: string;
			decisionId: string;
			symbol: string;
			timeframe: string;
			setupType: string;
			direction: string;
			status: Decision["status"];
			score: number;
			confidence: Decision["confidence"];
			note: string;
	  }
	| { type: "error"; at: string; context: string; message: string };

/** Append-only audit trail of what each cycle saw and decided. */
export interface BrainLog {
	append(entry: BrainLogEntry): Promise<void>;
}

export function decisionEntry(decision: Decision, at: Date): BrainLogEntry {
	return {
		type: "decision",
		at: at.toISOString(),
		decisionId: decision.id,
		symbol: decision.symbol,
		timeframe: decision.timeframe,
		setupType: decision.setupType,
		direction: decision.direction,
		status: decision.status,
		score: decision.score,
		confidence: decision.confidence,
		note: `${decision.status.toUpperCase()} (score: ${decision.score}) - ${decision.justification}`,
	};
}

export function createFileBrainLog(filePath: string): BrainLog {
	return {
		async append(entry) {
			try {
				await appendLine(filePath, JSON.stringify(entry));
			} catch (cause) {
				throw new PersistenceError(
					"appendBrainLog",
					{ file: filePath, type: entry.type },
					{ cause },
				);
			}
		},
	};
}
