import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { type ScenarioConfig, validateScenarioConfig } from "@callcenter-sim/core";
import { ScenarioFileError } from "./errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Scenario definitions shipped with the runner (3, 4 and 5 agents).
 */
export const DEFAULT_SCENARIOS_FILE = path.join(__dirname, "../../config/scenarios.json");

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScenarioConfig(value: unknown): value is ScenarioConfig {
	if (!isRecord(value)) return false;
	const range = value.serviceTimeRange;
	return (
		typeof value.label === "string" &&
		typeof value.numAgents === "number" &&
		typeof value.arrivalProbPerStep === "number" &&
		typeof value.simSteps === "number" &&
		isRecord(range) &&
		typeof range.min === "number" &&
		typeof range.max === "number"
	);
}

/**
 * Parse scenario definitions from the contents of a scenario file.
 * Every entry is shape-checked, then validated.
 *
 * @throws {ScenarioFileError} if the content is not a well-formed scenario list.
 * @throws {InvalidConfigurationError} if a scenario has out-of-range values.
 */
export function parseScenarioFile(filePath: string, content: string): ScenarioConfig[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw new ScenarioFileError(filePath, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
	}

	if (!isRecord(parsed) || !Array.isArray(parsed.scenarios)) {
		throw new ScenarioFileError(filePath, `expected an object with a "scenarios" array`);
	}
	if (parsed.scenarios.length === 0) {
		throw new ScenarioFileError(filePath, "no scenarios defined");
	}

	const scenarios: ScenarioConfig[] = [];
	const labels = new Set<string>();
	parsed.scenarios.forEach((entry: unknown, index: number) => {
		if (!isScenarioConfig(entry)) {
			throw new ScenarioFileError(filePath, `scenario #${index} is missing required fields`);
		}
		if (labels.has(entry.label)) {
			throw new ScenarioFileError(filePath, `duplicate scenario label "${entry.label}"`);
		}
		const scenario: ScenarioConfig = {
			label: entry.label,
			numAgents: entry.numAgents,
			arrivalProbPerStep: entry.arrivalProbPerStep,
			serviceTimeRange: { min: entry.serviceTimeRange.min, max: entry.serviceTimeRange.max },
			simSteps: entry.simSteps,
		};
		validateScenarioConfig(scenario);
		labels.add(scenario.label);
		scenarios.push(scenario);
	});

	return scenarios;
}

/**
 * Load scenario definitions from a JSON file.
 *
 * @param filePath - Defaults to the bundled config/scenarios.json
 */
export function loadScenarioFile(filePath: string = DEFAULT_SCENARIOS_FILE): ScenarioConfig[] {
	if (!fs.existsSync(filePath)) {
		throw new ScenarioFileError(filePath, "file not found");
	}
	return parseScenarioFile(filePath, fs.readFileSync(filePath, "utf-8"));
}
