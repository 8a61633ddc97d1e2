/**
 * Inclusive range of service durations, in steps.
 */
export interface ServiceTimeRange {
	min: number;
	max: number;
}

/**
 * Immutable description of one simulated call center.
 */
export interface ScenarioConfig {
	/** Identifier used in reports and exports */
	readonly label: string;
	/** Number of servers (agents) working the queue */
	readonly numAgents: number;
	/** Probability that a call arrives during any one step */
	readonly arrivalProbPerStep: number;
	/** Range each call's service time is drawn from */
	readonly serviceTimeRange: Readonly<ServiceTimeRange>;
	/** Number of 1-unit steps to simulate */
	readonly simSteps: number;
}
