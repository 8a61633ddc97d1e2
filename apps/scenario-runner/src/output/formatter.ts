import type { ReplicationSummary, WaitStats } from "@callcenter-sim/core";
import chalk from "chalk";
import type { ComparisonEntry, ExperimentResults, ScenarioReport } from "./types.js";

/**
 * Format wait stats as a compact string.
 */
export function formatWaitStats(stats: WaitStats): string {
	return `min=${stats.min}s, avg=${stats.avg.toFixed(2)}s, p50=${stats.p50}s, p95=${stats.p95}s, p99=${stats.p99}s, max=${stats.max}s`;
}

/**
 * Format a utilization fraction as a percentage.
 */
export function formatUtilization(utilization: number): string {
	return `${(utilization * 100).toFixed(1)}%`;
}

/**
 * One-line summary of a scenario.
 */
export function formatScenarioLine(report: ScenarioReport): string {
	const waitColor = report.avgWait <= 1 ? chalk.green : report.avgWait <= 5 ? chalk.yellow : chalk.red;
	return `avg_wait=${waitColor(`${report.avgWait.toFixed(2)}s`)}, max_queue=${report.maxQueue}, throughput=${report.throughput}, utilization=${formatUtilization(report.utilization)}`;
}

/**
 * One comparison line against the baseline.
 */
export function formatComparisonLine(entry: ComparisonEntry, baseline: string): string {
	const line = `${entry.label} avg wait = ${entry.avgWait.toFixed(2)}s`;
	if (entry.label === baseline) {
		return `${line} (baseline)`;
	}
	const pctColor = entry.improvementPct >= 0 ? chalk.green : chalk.red;
	return `${line} (${pctColor(`${entry.improvementPct.toFixed(1)}%`)} improvement)`;
}

function printScenario(report: ScenarioReport): void {
	console.log(chalk.bold(report.label));
	console.log(`  ${formatScenarioLine(report)}`);
	console.log(`  Calls:     ${report.callsServed}/${report.callsArrived} served`);
	if (report.waitStats) {
		console.log(`  Wait:      ${formatWaitStats(report.waitStats)}`);
	}
}

function printReplications(replications: ReplicationSummary[]): void {
	console.log("");
	console.log(chalk.bold(`Averaged over ${replications[0].replications} replications:`));
	for (const summary of replications) {
		console.log(
			`  ${summary.label}: avg_wait=${summary.avgWait.toFixed(2)}s, max_queue=${summary.maxQueue.toFixed(1)}, throughput=${summary.throughput.toFixed(1)}, utilization=${formatUtilization(summary.utilization)}`,
		);
	}
}

/**
 * Print results summary to console.
 */
export function printResults(results: ExperimentResults): void {
	console.log(chalk.gray("─────────────────────────────────────"));
	console.log(chalk.bold("         RESULTS SUMMARY"));
	console.log(chalk.gray("─────────────────────────────────────"));

	for (const report of results.scenarios) {
		printScenario(report);
	}

	console.log("");
	console.log(chalk.bold("Comparison:"));
	for (const entry of results.comparison) {
		console.log(`  ${formatComparisonLine(entry, results.baseline)}`);
	}

	if (results.replications && results.replications.length > 0) {
		printReplications(results.replications);
	}
}
