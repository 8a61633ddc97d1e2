import type { RandomSource } from "../domain/random-source.js";
import type { ReplicationSummary, RunResult } from "../domain/run-result.js";
import type { ScenarioConfig } from "../domain/scenario-config.js";
import { InvalidConfigurationError } from "../domain/errors.js";
import { DEFAULT_SEED, deriveSeed, SeededRandom } from "../random/index.js";
import { max, mean } from "../utils/stats.js";
import { validateScenarioConfig } from "../utils/validate-config.js";

/**
 * FIFO of pending call arrival steps. Popping advances a head index
 * instead of shifting the array.
 */
class CallQueue {
	private readonly arrivals: number[] = [];
	private head = 0;

	get length(): number {
		return this.arrivals.length - this.head;
	}

	push(arrivalStep: number): void {
		this.arrivals.push(arrivalStep);
	}

	pop(): number | undefined {
		if (this.head >= this.arrivals.length) return undefined;
		const arrivalStep = this.arrivals[this.head];
		this.head++;
		return arrivalStep;
	}
}

/**
 * Runs one scenario to completion.
 *
 * Each step applies, in order: service advance, arrival, assignment, recording.
 * Advancing first lets a server freed this step take a waiting call in the same step.
 *
 * @param config - The scenario to simulate. Validated before the first step.
 * @param random - Generator driving arrivals and service times.
 * @throws {InvalidConfigurationError} if the configuration is invalid.
 */
export function runSimulation(config: ScenarioConfig, random: RandomSource = new SeededRandom(DEFAULT_SEED)): RunResult {
	validateScenarioConfig(config);

	const { numAgents, arrivalProbPerStep, serviceTimeRange, simSteps } = config;
	const servers = new Array<number>(numAgents).fill(0);
	const queue = new CallQueue();
	const waitTimes: number[] = [];
	const queueLengthSeries: number[] = [];
	let busyStepsTotal = 0;
	let callsServed = 0;
	let callsArrived = 0;

	for (let t = 0; t < simSteps; t++) {
		for (let i = 0; i < numAgents; i++) {
			if (servers[i] > 0) servers[i]--;
		}

		if (random.next() < arrivalProbPerStep) {
			queue.push(t);
			callsArrived++;
		}

		// Scan from index 0 so the lowest-indexed idle server is always bound first
		for (let i = 0; i < numAgents && queue.length > 0; i++) {
			if (servers[i] !== 0) continue;
			const arrivalStep = queue.pop();
			if (arrivalStep === undefined) break;
			servers[i] = random.nextInt(serviceTimeRange.min, serviceTimeRange.max);
			waitTimes.push(t - arrivalStep);
			callsServed++;
		}

		queueLengthSeries.push(queue.length);
		for (const remaining of servers) {
			if (remaining > 0) busyStepsTotal++;
		}
	}

	return {
		label: config.label,
		config,
		seed: random instanceof SeededRandom ? random.seed : null,
		waitTimes,
		queueLengthSeries,
		busyStepsTotal,
		callsServed,
		callsArrived,
		avgWait: mean(waitTimes),
		maxQueue: max(queueLengthSeries),
		throughput: callsServed,
		utilization: busyStepsTotal / (numAgents * simSteps),
	};
}

/**
 * Runs one scenario with a fresh generator built from the given seed.
 */
export function runSeededSimulation(config: ScenarioConfig, seed: number): RunResult {
	return runSimulation(config, new SeededRandom(seed));
}

export interface ReplicationOptions {
	/** Number of independent runs to average */
	replications: number;
	/** Base seed; run i uses deriveSeed(seed, i) */
	seed: number;
}

/**
 * Averages the summary metrics of several independently seeded runs.
 *
 * @throws {InvalidConfigurationError} if replications is not a positive integer
 * or the configuration is invalid.
 */
export function runReplications(config: ScenarioConfig, options: ReplicationOptions): ReplicationSummary {
	const { replications, seed } = options;
	if (!Number.isInteger(replications) || replications < 1) {
		throw new InvalidConfigurationError(`replications must be a positive integer, got ${replications}`);
	}

	const seeds = Array.from({ length: replications }, (_, i) => deriveSeed(seed, i));
	const runs = seeds.map((runSeed) => runSeededSimulation(config, runSeed));

	return {
		label: config.label,
		replications,
		seeds,
		avgWait: mean(runs.map((run) => run.avgWait)),
		maxQueue: mean(runs.map((run) => run.maxQueue)),
		throughput: mean(runs.map((run) => run.throughput)),
		utilization: mean(runs.map((run) => run.utilization)),
	};
}
