import {
	calculateWaitStats,
	InvalidConfigurationError,
	percentImprovement,
	type ReplicationSummary,
	type RunResult,
} from "@callcenter-sim/core";
import type { ComparisonEntry, ExperimentResults, ScenarioReport } from "../output/types.js";

export interface BuildResultsOptions {
	seed: number;
	/** Label of the scenario the others are compared against; defaults to the first */
	baseline?: string;
	replications?: ReplicationSummary[];
	timestamp?: Date;
}

function toScenarioReport(run: RunResult): ScenarioReport {
	return {
		label: run.label,
		seed: run.seed,
		config: run.config,
		callsArrived: run.callsArrived,
		callsServed: run.callsServed,
		avgWait: run.avgWait,
		maxQueue: run.maxQueue,
		throughput: run.throughput,
		utilization: run.utilization,
		waitStats: calculateWaitStats(run.waitTimes),
		queueLengthSeries: [...run.queueLengthSeries],
	};
}

/**
 * Build the results structure from finished runs.
 *
 * @throws {InvalidConfigurationError} if there are no runs or the baseline label is unknown.
 */
export function buildExperimentResults(runs: RunResult[], options: BuildResultsOptions): ExperimentResults {
	if (runs.length === 0) {
		throw new InvalidConfigurationError("no scenario results to report");
	}

	const baselineLabel = options.baseline ?? runs[0].label;
	const baseline = runs.find((run) => run.label === baselineLabel);
	if (!baseline) {
		throw new InvalidConfigurationError(
			`baseline "${baselineLabel}" is not one of: ${runs.map((run) => run.label).join(", ")}`,
		);
	}

	const comparison: ComparisonEntry[] = runs.map((run) => ({
		label: run.label,
		avgWait: run.avgWait,
		improvementPct: percentImprovement(baseline.avgWait, run.avgWait),
	}));

	const results: ExperimentResults = {
		timestamp: (options.timestamp ?? new Date()).toISOString(),
		seed: options.seed,
		baseline: baselineLabel,
		scenarios: runs.map(toScenarioReport),
		comparison,
	};
	if (options.replications && options.replications.length > 0) {
		results.replications = options.replications;
	}
	return results;
}
