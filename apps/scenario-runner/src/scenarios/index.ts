import { deriveSeed, type RunResult, runSeededSimulation, type ScenarioConfig } from "@callcenter-sim/core";
import type {
	IndexedResult,
	IndexedScenario,
	RunScenariosOptions,
	ScenarioOverrides,
	ScenarioTemplate,
} from "./types.js";

export type { IndexedResult, IndexedScenario, RunScenariosOptions, ScenarioOverrides, ScenarioTemplate };

/**
 * Build one scenario per agent count, labelled "<n>_agents".
 */
export function buildAgentScenarios(template: ScenarioTemplate, agents: number[]): ScenarioConfig[] {
	return agents.map((numAgents) => ({
		label: `${numAgents}_agents`,
		numAgents,
		arrivalProbPerStep: template.arrivalProbPerStep,
		serviceTimeRange: { min: template.serviceTimeRange.min, max: template.serviceTimeRange.max },
		simSteps: template.simSteps,
	}));
}

/**
 * Apply shared overrides to every scenario. Returns new objects.
 */
export function applyOverrides(scenarios: ScenarioConfig[], overrides: ScenarioOverrides): ScenarioConfig[] {
	return scenarios.map((scenario) => ({
		label: scenario.label,
		numAgents: scenario.numAgents,
		arrivalProbPerStep: overrides.arrivalProbPerStep ?? scenario.arrivalProbPerStep,
		serviceTimeRange: {
			min: overrides.serviceMin ?? scenario.serviceTimeRange.min,
			max: overrides.serviceMax ?? scenario.serviceTimeRange.max,
		},
		simSteps: overrides.simSteps ?? scenario.simSteps,
	}));
}

/**
 * Run a set of scenarios at their batch positions.
 * Used in-process and by worker processes, so both produce the same results.
 */
export function runIndexedScenarios(
	assignments: IndexedScenario[],
	seed: number,
	onScenarioComplete?: (completed: IndexedResult) => void,
): IndexedResult[] {
	return assignments.map(({ index, scenario }) => {
		const completed = { index, result: runSeededSimulation(scenario, deriveSeed(seed, index)) };
		onScenarioComplete?.(completed);
		return completed;
	});
}

/**
 * Run every scenario sequentially, in order.
 */
export function runScenarios(scenarios: ScenarioConfig[], options: RunScenariosOptions): RunResult[] {
	const assignments = scenarios.map((scenario, index) => ({ index, scenario }));
	return runIndexedScenarios(assignments, options.seed, options.onScenarioComplete).map(({ result }) => result);
}

/**
 * Split a batch round-robin across workers. Workers that would get nothing are omitted.
 */
export function partitionScenarios(scenarios: ScenarioConfig[], workerCount: number): IndexedScenario[][] {
	const buckets: IndexedScenario[][] = Array.from({ length: Math.min(workerCount, scenarios.length) }, () => []);
	scenarios.forEach((scenario, index) => {
		buckets[index % buckets.length].push({ index, scenario });
	});
	return buckets;
}
