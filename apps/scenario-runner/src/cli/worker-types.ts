import * as os from "node:os";
import type { IndexedResult, IndexedScenario } from "../scenarios/types.js";
import { parseIntegerOption } from "./options.js";

/**
 * Configuration sent from coordinator to worker via IPC.
 */
export interface WorkerConfig {
	/** Unique identifier for this worker (0-indexed) */
	workerId: number;
	/** Base seed of the batch */
	seed: number;
	/** Scenarios this worker runs, with their batch positions */
	assignments: IndexedScenario[];
}

/**
 * Result message sent from worker to coordinator via IPC.
 */
export interface WorkerResultMessage {
	type: "result";
	workerId: number;
	results: IndexedResult[];
}

/**
 * Progress update sent after each scenario a worker finishes.
 */
export interface WorkerProgressMessage {
	type: "progress";
	workerId: number;
	/** Batch position of the scenario that just finished */
	index: number;
}

/**
 * Error message sent from worker to coordinator via IPC.
 */
export interface WorkerErrorMessage {
	type: "error";
	workerId: number;
	error: string;
}

/**
 * Union type for all messages from worker to coordinator.
 */
export type WorkerMessage = WorkerResultMessage | WorkerProgressMessage | WorkerErrorMessage;

/**
 * Check that an IPC payload has the shape of a WorkerConfig.
 */
export function isWorkerConfig(message: unknown): message is WorkerConfig {
	return (
		typeof message === "object" &&
		message !== null &&
		"workerId" in message &&
		typeof message.workerId === "number" &&
		"seed" in message &&
		typeof message.seed === "number" &&
		"assignments" in message &&
		Array.isArray(message.assignments)
	);
}

/**
 * Parse the workers CLI option.
 * Returns the number of workers, or "auto" to detect CPU count.
 */
export function parseWorkersOption(value: string): number | "auto" {
	if (value === "auto") {
		return "auto";
	}
	return parseIntegerOption("workers", value, 1);
}

/**
 * Get the actual worker count based on the option value.
 */
export function getWorkerCount(option: number | "auto"): number {
	if (option === "auto") {
		return os.cpus().length;
	}
	return option;
}
