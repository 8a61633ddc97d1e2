import type { ScenarioConfig } from "./scenario-config.js";

/**
 * Scalar metrics reduced from a finished run.
 */
export interface RunSummary {
	/** Mean wait in steps over all served calls, 0 when none were served */
	avgWait: number;
	/** Largest residual queue length seen after any step */
	maxQueue: number;
	/** Calls assigned to a server during the run */
	throughput: number;
	/** Busy server-steps over total server-steps, in [0, 1] */
	utilization: number;
}

/**
 * Everything a single run produced. Built once, never mutated afterwards.
 */
export interface RunResult extends RunSummary {
	label: string;
	config: ScenarioConfig;
	/** Seed of the generator that drove the run, when known */
	seed: number | null;
	/** Per-call wait, in assignment order */
	waitTimes: readonly number[];
	/** Queue length after each step's assignment phase, indexed by step */
	queueLengthSeries: readonly number[];
	busyStepsTotal: number;
	callsServed: number;
	callsArrived: number;
}

/**
 * Metrics averaged over several independently seeded runs of one scenario.
 */
export interface ReplicationSummary extends RunSummary {
	label: string;
	replications: number;
	seeds: number[];
}
