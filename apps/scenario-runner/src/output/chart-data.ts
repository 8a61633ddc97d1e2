import * as fs from "node:fs";
import * as path from "node:path";
import type { ExperimentResults } from "./types.js";

export const AVG_WAIT_FILE = "avg_wait.csv";
export const MAX_QUEUE_FILE = "max_queue.csv";
export const QUEUE_TIMESERIES_FILE = "queue_timeseries.csv";

function formatCell(value: string | number): string {
	if (typeof value === "number") {
		return Number.isInteger(value) ? value.toString() : value.toFixed(4);
	}
	return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render rows as CSV with a header line.
 */
export function toCsv(headers: string[], rows: Array<Array<string | number>>): string {
	const lines = [headers.map(formatCell).join(",")];
	for (const row of rows) {
		lines.push(row.map(formatCell).join(","));
	}
	return `${lines.join("\n")}\n`;
}

/**
 * Average wait per scenario (bar chart input).
 */
export function avgWaitCsv(results: ExperimentResults): string {
	return toCsv(
		["scenario", "avg_wait"],
		results.scenarios.map((report) => [report.label, report.avgWait]),
	);
}

/**
 * Maximum queue length per scenario (bar chart input).
 */
export function maxQueueCsv(results: ExperimentResults): string {
	return toCsv(
		["scenario", "max_queue"],
		results.scenarios.map((report) => [report.label, report.maxQueue]),
	);
}

/**
 * Queue length per step, one column per scenario (line chart input).
 * Scenarios with fewer steps leave their trailing cells empty.
 */
export function queueTimeseriesCsv(results: ExperimentResults): string {
	const steps = Math.max(0, ...results.scenarios.map((report) => report.queueLengthSeries.length));
	const rows: Array<Array<string | number>> = [];
	for (let step = 0; step < steps; step++) {
		rows.push([step, ...results.scenarios.map((report) => report.queueLengthSeries[step] ?? "")]);
	}
	return toCsv(["step", ...results.scenarios.map((report) => report.label)], rows);
}

/**
 * Write the three chart data files into a directory and return their paths.
 */
export function writeChartData(exportDir: string, results: ExperimentResults): string[] {
	fs.mkdirSync(exportDir, { recursive: true });

	const files: Array<[string, string]> = [
		[AVG_WAIT_FILE, avgWaitCsv(results)],
		[MAX_QUEUE_FILE, maxQueueCsv(results)],
		[QUEUE_TIMESERIES_FILE, queueTimeseriesCsv(results)],
	];

	return files.map(([name, content]) => {
		const filePath = path.join(exportDir, name);
		fs.writeFileSync(filePath, content);
		console.log(`[sim] Saved ${filePath}`);
		return filePath;
	});
}
