import { ErrorCode, SimulationError } from "@callcenter-sim/core";

/**
 * A scenario file that is missing, unreadable or malformed.
 */
export class ScenarioFileError extends SimulationError {
	constructor(
		public readonly filePath: string,
		detail: string,
	) {
		super(ErrorCode.SCENARIO_FILE_INVALID, `${filePath}: ${detail}`);
	}
}
