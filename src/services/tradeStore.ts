import { z } from "zod";
import type { ClosedTrade, PaperState } from "../types";
import { PersistenceError } from "../errors";
import { appendLine, readJson, readNdjson, writeJson } from "../utils/storage";
import {
	AccountSchema,
	ClosedTradeSchema,
	PositionSchema,
} from "./recordSchemas";

/**
 * Account and open-position slot live in one document so a cycle commits both
 * in a single write. Closed trades go to an append-only ledger keyed by
 * position id.
 */
export interface TradeStore {
	loadState(): Promise<PaperState | null>;
	saveState(state: PaperState): Promise<void>;
	/** No-op when a trade with the same id is already in the ledger. */
	appendClosedTrade(trade: ClosedTrade): Promise<void>;
	findClosedTrade(positionId: string): Promise<ClosedTrade | null>;
}

export type TradeStorePaths = {
	paperState: string;
	closedTrades: string;
};

const PaperStateSchema = z.object({
	account: AccountSchema,
	position: PositionSchema.nullable(),
}) satisfies z.ZodType<PaperState>;

async function guarded<T>(
	operation: string,
	context: Record<string, unknown>,
	run: () => Promise<T>,
): Promise<T> {
	try {
		return await run();
	} catch (cause) {
		throw new PersistenceError(operation, context, { cause });
	}
}

export function createFileTradeStore(paths: TradeStorePaths): TradeStore {
	const readLedger = () =>
		readNdjson(paths.closedTrades, (v) => {
			const parsed = ClosedTradeSchema.safeParse(v);
			return parsed.success ? parsed.data : null;
		});

	return {
		loadState: () =>
			guarded("loadPaperState", { file: paths.paperState }, () =>
				readJson<PaperState | null>(paths.paperState, null, (v) =>
					PaperStateSchema.parse(v),
				),
			),
		saveState: (state) =>
			guarded(
				"savePaperState",
				{
					file: paths.paperState,
					equity: state.account.equity,
					positionId: state.position?.id ?? null,
				},
				() => writeJson(paths.paperState, state),
			),
		appendClosedTrade: (trade) =>
			guarded(
				"appendClosedTrade",
				{ file: paths.closedTrades, positionId: trade.id },
				async () => {
					const ledger = await readLedger();
					if (ledger.some((t) => t.id === trade.id)) return;
					await appendLine(paths.closedTrades, JSON.stringify(trade));
				},
			),
		findClosedTrade: (positionId) =>
			guarded("findClosedTrade", { file: paths.closedTrades, positionId }, async () => {
				const ledger = await readLedger();
				return ledger.find((t) => t.id === positionId) ?? null;
			}),
	};
}
