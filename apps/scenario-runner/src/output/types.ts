import type { ReplicationSummary, ScenarioConfig, WaitStats } from "@callcenter-sim/core";

/**
 * Per-scenario section of the results file.
 */
export interface ScenarioReport {
	label: string;
	seed: number | null;
	config: ScenarioConfig;
	callsArrived: number;
	callsServed: number;
	/** Mean wait in steps (seconds at 1 step = 1s) */
	avgWait: number;
	maxQueue: number;
	throughput: number;
	/** Fraction of server-steps spent busy, in [0, 1] */
	utilization: number;
	waitStats: WaitStats | null;
	/** Queue length after each step, indexed by step */
	queueLengthSeries: number[];
}

/**
 * Average wait of one scenario relative to the baseline scenario.
 */
export interface ComparisonEntry {
	label: string;
	avgWait: number;
	/** Positive when the scenario waits less than the baseline */
	improvementPct: number;
}

/**
 * Complete results structure for JSON output.
 */
export interface ExperimentResults {
	timestamp: string;
	seed: number;
	baseline: string;
	scenarios: ScenarioReport[];
	comparison: ComparisonEntry[];
	/** Only present when replications were requested */
	replications?: ReplicationSummary[];
}
