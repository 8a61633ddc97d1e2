import { InvalidConfigurationError } from "../domain/errors.js";
import type { ScenarioConfig } from "../domain/scenario-config.js";

function isPositiveInteger(value: number): boolean {
	return Number.isInteger(value) && value > 0;
}

/**
 * Checks a scenario before any stepping begins.
 *
 * @throws {InvalidConfigurationError} naming the first offending field.
 */
export function validateScenarioConfig(config: ScenarioConfig): void {
	const { label, numAgents, arrivalProbPerStep, serviceTimeRange, simSteps } = config;

	if (label.trim().length === 0) {
		throw new InvalidConfigurationError("label must not be empty");
	}
	if (!isPositiveInteger(numAgents)) {
		throw new InvalidConfigurationError(`[${label}] numAgents must be a positive integer, got ${numAgents}`);
	}
	if (!isPositiveInteger(simSteps)) {
		throw new InvalidConfigurationError(`[${label}] simSteps must be a positive integer, got ${simSteps}`);
	}
	if (!Number.isFinite(arrivalProbPerStep) || arrivalProbPerStep < 0 || arrivalProbPerStep > 1) {
		throw new InvalidConfigurationError(`[${label}] arrivalProbPerStep must be within [0, 1], got ${arrivalProbPerStep}`);
	}
	if (!isPositiveInteger(serviceTimeRange.min) || !isPositiveInteger(serviceTimeRange.max)) {
		throw new InvalidConfigurationError(
			`[${label}] serviceTimeRange bounds must be positive integers, got (${serviceTimeRange.min}, ${serviceTimeRange.max})`,
		);
	}
	if (serviceTimeRange.min > serviceTimeRange.max) {
		throw new InvalidConfigurationError(
			`[${label}] serviceTimeRange min must not exceed max, got (${serviceTimeRange.min}, ${serviceTimeRange.max})`,
		);
	}
}
