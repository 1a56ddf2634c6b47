import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../errors";
import { createFileSetupStore } from "./setupStore";

const input = {
	symbol: "ETHUSDT",
	timeframe: "1d" as const,
	setupType: "trend_acceleration" as const,
	direction: "long" as const,
	status: "FORMING" as const,
	confidence: "MEDIUM" as const,
	context: "Close 3.40% from the fast MA",
	detectedAt: "2024-03-01T00:00:00.000Z",
	updatedAt: "2024-03-01T00:00:00.000Z",
};

describe("file setup store", () => {
	let dir: string;
	let file: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), "setup-store-"));
		file = path.join(dir, "nested", "setups.json");
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	it("creates, lists and updates records", async () => {
		const store = createFileSetupStore(file);
		expect(await store.listForming()).toEqual([]);

		const created = await store.create(input);
		expect(created.id).toMatch(/^[0-9a-f-]{36}$/);

		const updated = await store.update(created.id, {
			confidence: "HIGH",
			direction: "long",
			context: "Close -7.10% from the slow MA",
			updatedAt: "2024-03-02T00:00:00.000Z",
		});
		expect(updated).toEqual({
			...created,
			confidence: "HIGH",
			context: "Close -7.10% from the slow MA",
			updatedAt: "2024-03-02T00:00:00.000Z",
		});
		expect(await createFileSetupStore(file).listForming()).toEqual([updated]);
	});

	it("reports a missing record on update", async () => {
		const store = createFileSetupStore(file);
		await expect(
			store.update("nope", {
				confidence: "HIGH",
				direction: "short",
				context: "x",
				updatedAt: "2024-03-02T00:00:00.000Z",
			}),
		).rejects.toMatchObject({
			operation: "updateSetup",
			context: { id: "nope", reason: "record not found" },
		});
	});

	it("wraps a corrupt file", async () => {
		await fs.mkdir(path.dirname(file), { recursive: true });
		await fs.writeFile(file, JSON.stringify([{ id: 1 }]), "utf8");
		await expect(createFileSetupStore(file).listForming()).rejects.toBeInstanceOf(
			PersistenceError,
		);
	});
});
