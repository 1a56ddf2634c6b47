import fs from "node:fs/promises";
import path from "node:path";

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readJson<T>(
	filePath: string,
	fallback: T,
	parse: (value: unknown) => T,
): Promise<T> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err: unknown) {
		if (isMissingFile(err)) {
			return fallback;
		}
		throw err;
	}
	return parse(JSON.parse(content));
}

/** Writes through a temp file so a crash never leaves half a document behind. */
export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmp = `${filePath}.${process.pid}.tmp`;
	await fs.writeFile(tmp, JSON.stringify(data, null, 2), "utf8");
	await fs.rename(tmp, filePath);
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}

export async function readNdjson<T>(
	filePath: string,
	mapper: (value: unknown) => T | null,
): Promise<T[]> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err: unknown) {
		if (isMissingFile(err)) {
			return [];
		}
		throw err;
	}

	const entries: T[] = [];
	for (const line of content.split("\n")) {
		if (!line.trim()) continue;
		const mapped = mapper(JSON.parse(line));
		if (mapped) entries.push(mapped);
	}
	return entries;
}
