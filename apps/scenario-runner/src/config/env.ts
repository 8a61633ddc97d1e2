import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidConfigurationError, MAX_SEED } from "@callcenter-sim/core";
import { config as loadDotenv } from "dotenv";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Settings the runner accepts from the environment.
 */
export interface RunnerEnv {
	/** SIM_SEED */
	seed?: number;
	/** SIM_SCENARIOS_FILE */
	scenariosFile?: string;
	/** SIM_EXPORT_DIR */
	exportDir?: string;
}

/**
 * Load the runner's .env file into process.env, if there is one.
 * Variables already set in the environment win.
 */
export function loadEnvFile(envPath: string = path.resolve(__dirname, "../../.env")): void {
	loadDotenv({ path: envPath });
}

/**
 * Read runner settings from environment variables.
 *
 * @throws {InvalidConfigurationError} if SIM_SEED is not an unsigned 32-bit integer.
 */
export function readRunnerEnv(env: NodeJS.ProcessEnv = process.env): RunnerEnv {
	const result: RunnerEnv = {};

	const rawSeed = env.SIM_SEED;
	if (rawSeed !== undefined && rawSeed !== "") {
		const seed = Number(rawSeed);
		if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
			throw new InvalidConfigurationError(`SIM_SEED must be an integer within [0, ${MAX_SEED}], got "${rawSeed}"`);
		}
		result.seed = seed;
	}
	if (env.SIM_SCENARIOS_FILE) {
		result.scenariosFile = env.SIM_SCENARIOS_FILE;
	}
	if (env.SIM_EXPORT_DIR) {
		result.exportDir = env.SIM_EXPORT_DIR;
	}

	return result;
}
