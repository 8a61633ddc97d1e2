#!/usr/bin/env node
/**
 * Worker process entry point for running scenarios in parallel.
 *
 * Spawned by the coordinator (coordinator.ts) via child_process.fork(). It receives
 * its share of the batch via IPC, runs it, and sends the results back.
 */

import { runIndexedScenarios } from "../scenarios/index.js";
import {
	isWorkerConfig,
	type WorkerConfig,
	type WorkerErrorMessage,
	type WorkerProgressMessage,
	type WorkerResultMessage,
} from "./worker-types.js";

/**
 * Send a message to the coordinator process.
 */
function sendToCoordinator(message: WorkerResultMessage | WorkerProgressMessage | WorkerErrorMessage): void {
	if (process.send) {
		process.send(message);
	} else {
		console.error("[worker] Not running as forked process, cannot send message");
	}
}

/**
 * Run the assigned scenarios and report back.
 */
function handleConfig(config: WorkerConfig): void {
	const { workerId, seed, assignments } = config;

	try {
		const results = runIndexedScenarios(assignments, seed, ({ index }) => {
			sendToCoordinator({ type: "progress", workerId, index });
		});
		sendToCoordinator({ type: "result", workerId, results });
	} catch (error) {
		sendToCoordinator({
			type: "error",
			workerId,
			error: error instanceof Error ? error.message : String(error),
		});
	}
}

// Listen for configuration from the coordinator
process.on("message", (message: unknown) => {
	if (!isWorkerConfig(message)) {
		sendToCoordinator({
			type: "error",
			workerId: -1,
			error: "Invalid configuration received",
		});
		return;
	}

	handleConfig(message);
});

process.on("uncaughtException", (error) => {
	sendToCoordinator({
		type: "error",
		workerId: -1,
		error: `Uncaught exception: ${error.message}`,
	});
	process.exit(1);
});
