import crypto from "node:crypto";
import { z } from "zod";
import { PersistenceError } from "../errors";
import type { SetupRecord } from "../types";
import { readJson, writeJson } from "../utils/storage";
import { SetupRecordSchema } from "./recordSchemas";

export type SetupRecordInput = Omit<SetupRecord, "id">;
export type SetupRecordPatch = Pick<
	SetupRecord,
	"confidence" | "direction" | "context" | "updatedAt"
>;

export interface SetupStore {
	listForming(): Promise<SetupRecord[]>;
	create(record: SetupRecordInput): Promise<SetupRecord>;
	update(id: string, patch: SetupRecordPatch): Promise<SetupRecord>;
}

const SetupFileSchema = z.array(SetupRecordSchema);

export function createFileSetupStore(filePath: string): SetupStore {
	const load = () =>
		readJson<SetupRecord[]>(filePath, [], (v) => SetupFileSchema.parse(v));

	return {
		async listForming() {
			try {
				const records = await load();
				return records.filter((r) => r.status === "FORMING");
			} catch (cause) {
				throw new PersistenceError("listFormingSetups", { file: filePath }, { cause });
			}
		},
		async create(input) {
			try {
				const records = await load();
				const record: SetupRecord = { id: crypto.randomUUID(), ...input };
				await writeJson(filePath, [...records, record]);
				return record;
			} catch (cause) {
				throw new PersistenceError(
					"createSetup",
					{ file: filePath, symbol: input.symbol, setupType: input.setupType },
					{ cause },
				);
			}
		},
		async update(id, patch) {
			let records: SetupRecord[];
			try {
				records = await load();
			} catch (cause) {
				throw new PersistenceError("updateSetup", { file: filePath, id }, { cause });
			}
			const idx = records.findIndex((r) => r.id === id);
			if (idx < 0) {
				throw new PersistenceError("updateSetup", {
					file: filePath,
					id,
					reason: "record not found",
				});
			}
			const updated: SetupRecord = { ...records[idx], ...patch };
			records[idx] = updated;
			try {
				await writeJson(filePath, records);
			} catch (cause) {
				throw new PersistenceError("updateSetup", { file: filePath, id }, { cause });
			}
			return updated;
		},
	};
}
