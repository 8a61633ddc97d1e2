import type { RunResult, ScenarioConfig } from "@callcenter-sim/core";

/**
 * A finished run with hand-picked numbers, for reporting tests.
 */
export function createRun(label: string, overrides: Partial<RunResult> = {}): RunResult {
	const config: ScenarioConfig = {
		label,
		numAgents: 2,
		arrivalProbPerStep: 0.5,
		serviceTimeRange: { min: 1, max: 3 },
		simSteps: 4,
	};
	return {
		label,
		config,
		seed: 42,
		waitTimes: [0, 2, 1, 1],
		queueLengthSeries: [0, 1, 2, 0],
		busyStepsTotal: 6,
		callsServed: 4,
		callsArrived: 4,
		avgWait: 1,
		maxQueue: 2,
		throughput: 4,
		utilization: 0.75,
		...overrides,
	};
}
