import * as fs from "node:fs";
import * as path from "node:path";
import * as vega from "vega";
import { compile, type TopLevelSpec } from "vega-lite";
import type { ExperimentResults } from "./types.js";

export const AVG_WAIT_CHART = "avg_wait.svg";
export const MAX_QUEUE_CHART = "max_queue.svg";
export const QUEUE_TIMESERIES_CHART = "queue_timeseries.svg";

const BAR_WIDTH = 360;
const BAR_HEIGHT = 240;

function scenarioBarSpec(results: ExperimentResults, title: string, field: "avgWait" | "maxQueue", axisTitle: string): TopLevelSpec {
	return {
		title,
		width: BAR_WIDTH,
		height: BAR_HEIGHT,
		data: { values: results.scenarios.map((report) => ({ scenario: report.label, value: report[field] })) },
		layer: [
			{
				mark: { type: "bar", color: "#4c78a8" },
			},
			{
				mark: { type: "text", dy: -6 },
				encoding: { text: { field: "value", type: "quantitative", format: ".2~f" } },
			},
		],
		encoding: {
			x: { field: "scenario", type: "nominal", sort: null, title: "Scenario", axis: { labelAngle: 0 } },
			y: { field: "value", type: "quantitative", title: axisTitle },
		},
	};
}

/**
 * Bar chart of the mean wait per scenario.
 */
export function avgWaitChartSpec(results: ExperimentResults): TopLevelSpec {
	return scenarioBarSpec(results, "Average wait by staffing", "avgWait", "Average wait (steps)");
}

/**
 * Bar chart of the longest queue per scenario.
 */
export function maxQueueChartSpec(results: ExperimentResults): TopLevelSpec {
	return scenarioBarSpec(results, "Maximum queue length by staffing", "maxQueue", "Max queue length");
}

/**
 * Step chart of the queue length over time, one line per scenario.
 */
export function queueTimeseriesChartSpec(results: ExperimentResults): TopLevelSpec {
	const values = results.scenarios.flatMap((report) =>
		report.queueLengthSeries.map((queue, step) => ({ scenario: report.label, step, queue })),
	);
	return {
		title: "Queue length over time",
		width: 640,
		height: BAR_HEIGHT,
		data: { values },
		mark: { type: "line", interpolate: "step-after", strokeWidth: 1 },
		encoding: {
			x: { field: "step", type: "quantitative", title: "Step" },
			y: { field: "queue", type: "quantitative", title: "Queue length" },
			color: {
				field: "scenario",
				type: "nominal",
				sort: results.scenarios.map((report) => report.label),
				title: "Scenario",
			},
		},
	};
}

/**
 * Render a Vega-Lite spec to an SVG document without a browser.
 */
export async function renderSvg(spec: TopLevelSpec): Promise<string> {
	const view = new vega.View(vega.parse(compile(spec).spec), { renderer: "none" });
	try {
		return await view.toSVG();
	} finally {
		view.finalize();
	}
}

/**
 * Render the three charts into a directory and return their paths.
 */
export async function writeCharts(exportDir: string, results: ExperimentResults): Promise<string[]> {
	fs.mkdirSync(exportDir, { recursive: true });

	const charts: Array<[string, TopLevelSpec]> = [
		[AVG_WAIT_CHART, avgWaitChartSpec(results)],
		[MAX_QUEUE_CHART, maxQueueChartSpec(results)],
		[QUEUE_TIMESERIES_CHART, queueTimeseriesChartSpec(results)],
	];

	const written: string[] = [];
	for (const [name, spec] of charts) {
		const filePath = path.join(exportDir, name);
		fs.writeFileSync(filePath, await renderSvg(spec));
		console.log(`[sim] Saved ${filePath}`);
		written.push(filePath);
	}
	return written;
}
