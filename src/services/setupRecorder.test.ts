import { describe, expect, it } from "vitest";
import { PersistenceError } from "../errors";
import type { SetupCandidate, SetupRecord } from "../types";
import { SetupRecorder, planSetupWrites, setupKey } from "./setupRecorder";
import type { SetupStore } from "./setupStore";

function fakeStore(seed: SetupRecord[] = []) {
	const records = [...seed];
	const calls: string[] = [];
	let failNext = false;
	let nextId = 1;

	const store: SetupStore = {
		async listForming() {
			return records.filter((r) => r.status === "FORMING");
		},
		async create(input) {
			calls.push(`create ${input.symbol} ${input.setupType}`);
			if (failNext) {
				failNext = false;
				throw new PersistenceError("createSetup", { symbol: input.symbol });
			}
			const record = { id: `r${nextId++}`, ...input };
			records.push(record);
			return record;
		},
		async update(id, patch) {
			calls.push(`update ${id} ${patch.confidence}`);
			const idx = records.findIndex((r) => r.id === id);
			if (idx < 0) throw new PersistenceError("updateSetup", { id });
			records[idx] = { ...records[idx], ...patch };
			return records[idx];
		},
	};

	return {
		store,
		records,
		calls,
		failOnce() {
			failNext = true;
		},
	};
}

function candidate(overrides: Partial<SetupCandidate> = {}): SetupCandidate {
	return {
		symbol: "BTCUSDT",
		timeframe: "4h",
		setupType: "volatility_expansion",
		direction: "long",
		confidence: "MEDIUM",
		context: "Volatility expanded 2.50x its recent average",
		metrics: { volatilityRatio: 2.5 },
		...overrides,
	};
}

const NOW = new Date("2024-03-01T00:00:00.000Z");

describe("planSetupWrites", () => {
	it("creates, updates or skips by identity and confidence", () => {
		const cache = new Map([
			[setupKey(candidate()), { recordId: "r1", confidence: "MEDIUM" as const }],
			[
				setupKey(candidate({ symbol: "ETHUSDT" })),
				{ recordId: "r2", confidence: "MEDIUM" as const },
			],
		]);
		const writes = planSetupWrites(cache, [
			candidate(),
			candidate({ symbol: "ETHUSDT", confidence: "HIGH" }),
			candidate({ symbol: "SOLUSDT" }),
		]);
		expect(writes.map((w) => [w.action, w.key])).toEqual([
			["SKIP", "BTCUSDT|4h|volatility_expansion"],
			["UPDATE", "ETHUSDT|4h|volatility_expansion"],
			["CREATE", "SOLUSDT|4h|volatility_expansion"],
		]);
	});

	it("keeps the last occurrence of a repeated identity", () => {
		const writes = planSetupWrites(new Map(), [
			candidate({ confidence: "MEDIUM" }),
			candidate({ symbol: "ETHUSDT" }),
			candidate({ confidence: "HIGH" }),
		]);
		expect(writes).toHaveLength(2);
		expect(writes[1]).toMatchObject({
			action: "CREATE",
			key: "BTCUSDT|4h|volatility_expansion",
			candidate: { confidence: "HIGH" },
		});
	});
});

describe("SetupRecorder", () => {
	it("writes nothing on an unchanged second run", async () => {
		const { store, calls, records } = fakeStore();
		const recorder = await SetupRecorder.load(store);

		const first = await recorder.record([candidate()], NOW);
		expect(first).toEqual({ created: 1, updated: 0, skipped: 0, failed: 0 });
		expect(records[0]).toMatchObject({
			status: "FORMING",
			detectedAt: NOW.toISOString(),
			updatedAt: NOW.toISOString(),
		});

		const second = await recorder.record([candidate()], NOW);
		expect(second).toEqual({ created: 0, updated: 0, skipped: 1, failed: 0 });
		expect(calls).toEqual(["create BTCUSDT volatility_expansion"]);
	});

	it("updates the same record when confidence changes", async () => {
		const { store, calls, records } = fakeStore();
		const recorder = await SetupRecorder.load(store);
		await recorder.record([candidate()], NOW);

		const later = new Date("2024-03-01T04:00:00.000Z");
		const stats = await recorder.record(
			[candidate({ confidence: "HIGH", context: "Volatility expanded 3.20x its recent average" })],
			later,
		);
		expect(stats.updated).toBe(1);
		expect(calls[1]).toBe("update r1 HIGH");
		expect(records).toHaveLength(1);
		expect(records[0]).toMatchObject({
			confidence: "HIGH",
			detectedAt: NOW.toISOString(),
			updatedAt: later.toISOString(),
		});

		const unchanged = await recorder.record([candidate({ confidence: "HIGH" })], later);
		expect(unchanged.skipped).toBe(1);
		expect(calls).toHaveLength(2);
	});

	it("leaves the cache alone when a write fails so the next cycle retries", async () => {
		const fake = fakeStore();
		const recorder = await SetupRecorder.load(fake.store);
		fake.failOnce();

		const failed = await recorder.record([candidate()], NOW);
		expect(failed).toEqual({ created: 0, updated: 0, skipped: 0, failed: 1 });
		expect(fake.records).toHaveLength(0);

		const retried = await recorder.record([candidate()], NOW);
		expect(retried.created).toBe(1);
		expect(fake.records).toHaveLength(1);
	});

	it("seeds its cache from stored forming records", async () => {
		const { store, calls } = fakeStore([
			{
				id: "existing",
				symbol: "BTCUSDT",
				timeframe: "4h",
				setupType: "volatility_expansion",
				direction: "long",
				status: "FORMING",
				confidence: "MEDIUM",
				context: "earlier",
				detectedAt: "2024-02-01T00:00:00.000Z",
				updatedAt: "2024-02-01T00:00:00.000Z",
			},
		]);
		const recorder = await SetupRecorder.load(store);
		const stats = await recorder.record([candidate()], NOW);
		expect(stats.skipped).toBe(1);
		expect(calls).toEqual([]);
	});

	it("starts empty when the store cannot be listed", async () => {
		const { store } = fakeStore();
		const broken: SetupStore = {
			...store,
			listForming: async () => {
				throw new PersistenceError("listFormingSetups", {});
			},
		};
		const recorder = await SetupRecorder.load(broken);
		expect((await recorder.record([candidate()], NOW)).created).toBe(1);
	});
});
