export enum ErrorCode {
	// Configuration errors
	INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
	SCENARIO_FILE_INVALID = "SCENARIO_FILE_INVALID",

	// Execution errors
	WORKER_FAILED = "WORKER_FAILED",

	// Generic fallback
	UNKNOWN = "UNKNOWN",
}

export class SimulationError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
	) {
		super(message || code);
		this.name = code;
	}
}

export class InvalidConfigurationError extends SimulationError {
	constructor(message: string) {
		super(ErrorCode.INVALID_CONFIGURATION, message);
	}
}
