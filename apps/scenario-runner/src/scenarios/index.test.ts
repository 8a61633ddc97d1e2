import { deriveSeed, runSeededSimulation, type ScenarioConfig } from "@callcenter-sim/core";
import * as t from "vitest";
import {
	applyOverrides,
	buildAgentScenarios,
	type IndexedResult,
	partitionScenarios,
	runIndexedScenarios,
	runScenarios,
} from "./index.js";

const template = { arrivalProbPerStep: 0.5, serviceTimeRange: { min: 3, max: 7 }, simSteps: 300 };

t.describe("buildAgentScenarios", () => {
	t.test("should label scenarios by agent count", () => {
		const scenarios = buildAgentScenarios(template, [3, 4]);
		t.expect(scenarios).toEqual([
			{ label: "3_agents", numAgents: 3, ...template },
			{ label: "4_agents", numAgents: 4, ...template },
		]);
	});

	t.test("should not share the service range object with the template", () => {
		const [scenario] = buildAgentScenarios(template, [3]);
		t.expect(scenario.serviceTimeRange).not.toBe(template.serviceTimeRange);
	});
});

t.describe("applyOverrides", () => {
	const scenarios = buildAgentScenarios(template, [3]);

	t.test("should keep scenarios unchanged without overrides", () => {
		t.expect(applyOverrides(scenarios, {})).toEqual(scenarios);
	});

	t.test("should replace only the given fields", () => {
		t.expect(applyOverrides(scenarios, { serviceMax: 9, simSteps: 50 })).toEqual([
			{ label: "3_agents", numAgents: 3, arrivalProbPerStep: 0.5, serviceTimeRange: { min: 3, max: 9 }, simSteps: 50 },
		]);
	});
});

t.describe("runScenarios", () => {
	const scenarios = buildAgentScenarios(template, [3, 4, 5]);

	t.test("should run each scenario with a seed derived from its position", () => {
		const results = runScenarios(scenarios, { seed: 42 });

		t.expect(results.map((r) => r.label)).toEqual(["3_agents", "4_agents", "5_agents"]);
		t.expect(results.map((r) => r.seed)).toEqual([deriveSeed(42, 0), deriveSeed(42, 1), deriveSeed(42, 2)]);
		t.expect(results[1]).toEqual(runSeededSimulation(scenarios[1], deriveSeed(42, 1)));
	});

	t.test("should report each completed scenario in order", () => {
		const completed: number[] = [];
		runScenarios(scenarios, { seed: 1, onScenarioComplete: ({ index }) => completed.push(index) });
		t.expect(completed).toEqual([0, 1, 2]);
	});

	t.test("should match results computed from partitions", () => {
		const sequential = runScenarios(scenarios, { seed: 9 });
		const partitioned: IndexedResult[] = partitionScenarios(scenarios, 2).flatMap((bucket) =>
			runIndexedScenarios(bucket, 9),
		);
		partitioned.sort((a, b) => a.index - b.index);

		t.expect(partitioned.map(({ result }) => result)).toEqual(sequential);
	});
});

t.describe("partitionScenarios", () => {
	const scenarios: ScenarioConfig[] = buildAgentScenarios(template, [1, 2, 3, 4, 5]);

	t.test("should distribute round-robin", () => {
		const buckets = partitionScenarios(scenarios, 2);
		t.expect(buckets.map((bucket) => bucket.map(({ index }) => index))).toEqual([
			[0, 2, 4],
			[1, 3],
		]);
	});

	t.test("should not create more buckets than scenarios", () => {
		t.expect(partitionScenarios(scenarios, 8)).toHaveLength(5);
	});
});
