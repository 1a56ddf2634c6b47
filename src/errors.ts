/** Candle window is missing, too short or malformed. The pair is skipped for the cycle. */
export class DataError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "DataError";
	}
}

export class InsufficientDataError extends DataError {
	public readonly required: number;
	public readonly received: number;

	constructor(required: number, received: number) {
		super(`Need ${required} candles, received ${received}`);
		this.name = "InsufficientDataError";
		this.required = required;
		this.received = received;
	}
}

/** A numeric step cannot produce a usable result. The candidate is rejected. */
export class ComputationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ComputationError";
	}
}

export class InvalidStopError extends ComputationError {
	constructor(message: string) {
		super(message);
		this.name = "InvalidStopError";
	}
}

export class PersistenceError extends Error {
	public readonly operation: string;
	public readonly context: Record<string, unknown>;

	constructor(
		operation: string,
		context: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(`Persistence failed during ${operation}`, options);
		this.name = "PersistenceError";
		this.operation = operation;
		this.context = context;
	}
}

export class SimulationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SimulationError";
	}
}

export class ConfigError extends Error {
	public readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
