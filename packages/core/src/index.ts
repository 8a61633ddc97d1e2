export { ErrorCode, InvalidConfigurationError, SimulationError } from "./domain/errors.js";
export type { RandomSource } from "./domain/random-source.js";
export type { ReplicationSummary, RunResult, RunSummary } from "./domain/run-result.js";
export type { ScenarioConfig, ServiceTimeRange } from "./domain/scenario-config.js";
export { DEFAULT_SEED, deriveSeed, MAX_SEED, SeededRandom } from "./random/index.js";
export { type ReplicationOptions, runReplications, runSeededSimulation, runSimulation } from "./simulator/index.js";
export { calculateWaitStats, max, mean, percentImprovement, type WaitStats } from "./utils/stats.js";
export { validateScenarioConfig } from "./utils/validate-config.js";
