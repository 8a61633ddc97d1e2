import { DEFAULT_SEED, InvalidConfigurationError, MAX_SEED, type ScenarioConfig, validateScenarioConfig } from "@callcenter-sim/core";
import type { RunnerEnv } from "../config/env.js";
import { DEFAULT_SCENARIOS_FILE, loadScenarioFile } from "../config/scenarios.js";
import { applyOverrides, buildAgentScenarios, type ScenarioOverrides } from "../scenarios/index.js";

/**
 * Raw option values as commander hands them over.
 */
export interface CliOptions {
	scenarios?: string;
	agents?: string;
	arrivalProb?: string;
	serviceMin?: string;
	serviceMax?: string;
	steps?: string;
	seed?: string;
	replications: string;
	baseline?: string;
	output?: string;
	exportDir?: string;
	workers?: string;
}

/**
 * Fully resolved run settings.
 */
export interface RunSettings {
	scenariosFile: string;
	scenarios: ScenarioConfig[];
	seed: number;
	replications: number;
	baseline?: string;
	output?: string;
	exportDir?: string;
}

/**
 * Parse an integer flag, enforcing a lower and an optional upper bound.
 */
export function parseIntegerOption(flag: string, value: string, min: number, max?: number): number {
	const num = Number(value);
	if (value.trim() === "" || !Number.isInteger(num) || num < min) {
		throw new InvalidConfigurationError(`--${flag} must be an integer >= ${min}, got "${value}"`);
	}
	if (max !== undefined && num > max) {
		throw new InvalidConfigurationError(`--${flag} must be an integer <= ${max}, got "${value}"`);
	}
	return num;
}

/**
 * Parse a probability flag in [0, 1].
 */
export function parseProbabilityOption(flag: string, value: string): number {
	const num = Number(value);
	if (value.trim() === "" || !Number.isFinite(num) || num < 0 || num > 1) {
		throw new InvalidConfigurationError(`--${flag} must be a number within [0, 1], got "${value}"`);
	}
	return num;
}

/**
 * Parse a comma-separated list of agent counts, e.g. "3,4,5".
 */
export function parseAgentList(value: string): number[] {
	const agents = value.split(",").map((part) => parseIntegerOption("agents", part.trim(), 1));
	if (new Set(agents).size !== agents.length) {
		throw new InvalidConfigurationError(`--agents must not repeat a count, got "${value}"`);
	}
	return agents;
}

function parseOverrides(cli: CliOptions): ScenarioOverrides {
	const overrides: ScenarioOverrides = {};
	if (cli.arrivalProb !== undefined) overrides.arrivalProbPerStep = parseProbabilityOption("arrival-prob", cli.arrivalProb);
	if (cli.serviceMin !== undefined) overrides.serviceMin = parseIntegerOption("service-min", cli.serviceMin, 1);
	if (cli.serviceMax !== undefined) overrides.serviceMax = parseIntegerOption("service-max", cli.serviceMax, 1);
	if (cli.steps !== undefined) overrides.simSteps = parseIntegerOption("steps", cli.steps, 1);
	return overrides;
}

/**
 * Resolve CLI flags, environment settings and the scenario file into run settings.
 * Flags win over the environment, which wins over the file.
 *
 * With --agents, the first scenario in the file supplies the shared parameters
 * and one scenario is generated per agent count.
 *
 * @throws {InvalidConfigurationError} if a flag or a resulting scenario is invalid.
 */
export function resolveRunSettings(cli: CliOptions, env: RunnerEnv): RunSettings {
	const scenariosFile = cli.scenarios ?? env.scenariosFile ?? DEFAULT_SCENARIOS_FILE;
	const loaded = loadScenarioFile(scenariosFile);

	const base = cli.agents !== undefined ? buildAgentScenarios(loaded[0], parseAgentList(cli.agents)) : loaded;
	const scenarios = applyOverrides(base, parseOverrides(cli));
	for (const scenario of scenarios) {
		validateScenarioConfig(scenario);
	}
	if (cli.baseline !== undefined && !scenarios.some((scenario) => scenario.label === cli.baseline)) {
		throw new InvalidConfigurationError(
			`--baseline "${cli.baseline}" is not one of: ${scenarios.map((scenario) => scenario.label).join(", ")}`,
		);
	}

	return {
		scenariosFile,
		scenarios,
		seed: cli.seed !== undefined ? parseIntegerOption("seed", cli.seed, 0, MAX_SEED) : (env.seed ?? DEFAULT_SEED),
		replications: parseIntegerOption("replications", cli.replications, 1),
		baseline: cli.baseline,
		output: cli.output,
		exportDir: cli.exportDir ?? env.exportDir,
	};
}
