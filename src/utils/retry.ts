import { logger } from "./logger";

export async function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryOptions = {
	retries: number;
	backoffMs: number;
	label: string;
	wait?: (ms: number) => Promise<void>;
};

/** Runs `task` up to `retries + 1` times, doubling the pause after each failure. */
export async function withRetry<T>(
	task: () => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const wait = options.wait ?? sleep;
	let attempt = 0;
	for (;;) {
		try {
			return await task();
		} catch (error) {
			if (attempt >= options.retries) throw error;
			const delay = options.backoffMs * 2 ** attempt;
			attempt += 1;
			logger.warn(
				{ err: error, label: options.label, attempt, delay },
				"Retrying after failure",
			);
			await wait(delay);
		}
	}
}
