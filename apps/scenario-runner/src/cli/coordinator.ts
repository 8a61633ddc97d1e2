import { fork } from "node:child_process";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ErrorCode, type RunResult, type ScenarioConfig, SimulationError } from "@callcenter-sim/core";
import chalk from "chalk";
import { type IndexedResult, partitionScenarios } from "../scenarios/index.js";
import type { WorkerConfig, WorkerMessage } from "./worker-types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface RunWithWorkersOptions {
	/** Base seed of the batch */
	seed: number;
	/** Upper bound on forked processes; fewer are used for small batches */
	workerCount: number;
	/** Called with the batch position of each scenario a worker finishes */
	onScenarioComplete?: (index: number) => void;
	/** Node flags for the workers (default: this process's, so they inherit its loader) */
	execArgv?: string[];
}

/**
 * Run the batch across forked worker processes.
 * Each worker takes a round-robin share of the scenarios; results come back in batch order.
 */
export async function runWithWorkers(scenarios: ScenarioConfig[], options: RunWithWorkersOptions): Promise<RunResult[]> {
	const { seed, workerCount, onScenarioComplete, execArgv = process.execArgv } = options;
	const partitions = partitionScenarios(scenarios, workerCount);

	console.log(chalk.cyan(`[multi-worker] Spawning ${partitions.length} workers for ${scenarios.length} scenarios`));
	console.log("");

	// Same extension as this file, so the worker runs from sources or from dist alike
	const workerPath = path.join(__dirname, `worker${path.extname(__filename)}`);

	const results: IndexedResult[] = [];
	const errors: Array<{ workerId: number; error: string }> = [];

	const workerPromises = partitions.map((assignments, i) => {
		return new Promise<void>((resolve) => {
			const worker = fork(workerPath, [], {
				execArgv,
				stdio: ["pipe", "pipe", "pipe", "ipc"],
			});
			let settled = false;
			const settle = () => {
				if (!settled) {
					settled = true;
					if (worker.connected) worker.disconnect();
					resolve();
				}
			};

			worker.on("message", (message: WorkerMessage) => {
				if (message.type === "progress") {
					onScenarioComplete?.(message.index);
				} else if (message.type === "result") {
					results.push(...message.results);
					settle();
				} else if (message.type === "error") {
					errors.push({ workerId: message.workerId === -1 ? i : message.workerId, error: message.error });
					settle();
				}
			});

			worker.on("exit", (code) => {
				if (code !== 0 && code !== null && !settled) {
					errors.push({ workerId: i, error: `Worker ${i} exited with code ${code}` });
				}
				settle();
			});

			worker.on("error", (err) => {
				errors.push({ workerId: i, error: `Worker ${i} spawn error: ${err.message}` });
				settle();
			});

			const config: WorkerConfig = {
				workerId: i,
				seed,
				assignments,
			};
			worker.send(config);
		});
	});

	await Promise.all(workerPromises);

	if (errors.length > 0) {
		console.log("");
		console.log(chalk.red(`[multi-worker] ${errors.length} worker(s) failed:`));
		for (const err of errors) {
			console.log(chalk.red(`  Worker ${err.workerId}: ${err.error}`));
		}
	}

	if (results.length !== scenarios.length) {
		throw new SimulationError(
			ErrorCode.WORKER_FAILED,
			`Expected ${scenarios.length} scenario results, got ${results.length}`,
		);
	}

	return results.sort((a, b) => a.index - b.index).map(({ result }) => result);
}
