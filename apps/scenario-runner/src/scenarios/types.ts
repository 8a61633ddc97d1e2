import type { RunResult, ScenarioConfig } from "@callcenter-sim/core";

/**
 * Parameters shared by scenarios generated from an agent list.
 */
export type ScenarioTemplate = Omit<ScenarioConfig, "label" | "numAgents">;

/**
 * Values applied on top of every loaded scenario.
 */
export interface ScenarioOverrides {
	arrivalProbPerStep?: number;
	serviceMin?: number;
	serviceMax?: number;
	simSteps?: number;
}

/**
 * A scenario together with its position in the batch.
 * The position decides the seed, so it travels with the scenario to workers.
 */
export interface IndexedScenario {
	index: number;
	scenario: ScenarioConfig;
}

export interface IndexedResult {
	index: number;
	result: RunResult;
}

export interface RunScenariosOptions {
	/** Base seed; scenario i runs with deriveSeed(seed, i) */
	seed: number;
	/** Called after each scenario finishes */
	onScenarioComplete?: (completed: IndexedResult) => void;
}
