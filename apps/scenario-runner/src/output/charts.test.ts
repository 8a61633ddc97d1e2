import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as t from "vitest";
import { buildExperimentResults } from "../results/build.js";
import { createRun } from "../test/fixtures.js";
import {
	AVG_WAIT_CHART,
	MAX_QUEUE_CHART,
	QUEUE_TIMESERIES_CHART,
	queueTimeseriesChartSpec,
	renderSvg,
	writeCharts,
} from "./charts.js";

const labels = ["3_agents", "4_agents", "5_agents"];

const results = buildExperimentResults(
	[
		createRun("3_agents", { avgWait: 2.5, maxQueue: 6, queueLengthSeries: [0, 2, 6, 3] }),
		createRun("4_agents", { avgWait: 0.75, maxQueue: 2, queueLengthSeries: [0, 1, 2, 0] }),
		createRun("5_agents", { avgWait: 0.1, maxQueue: 1, queueLengthSeries: [0, 1, 0, 0] }),
	],
	{ seed: 1 },
);

t.describe("renderSvg", () => {
	t.test("should produce a standalone SVG document", async () => {
		const svg = await renderSvg(queueTimeseriesChartSpec(results));

		t.expect(svg.startsWith("<svg")).toBe(true);
		t.expect(svg).toContain("Queue length over time");
	});
});

t.describe("writeCharts", () => {
	let tmpDir: string;

	t.beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sim-charts-"));
		t.vi.spyOn(console, "log").mockImplementation(() => {});
	});

	t.afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
		t.vi.restoreAllMocks();
	});

	t.test("should write the three charts naming every scenario", async () => {
		const exportDir = path.join(tmpDir, "charts");

		const written = await writeCharts(exportDir, results);

		t.expect(written).toEqual([
			path.join(exportDir, AVG_WAIT_CHART),
			path.join(exportDir, MAX_QUEUE_CHART),
			path.join(exportDir, QUEUE_TIMESERIES_CHART),
		]);
		for (const filePath of written) {
			const svg = fs.readFileSync(filePath, "utf-8");
			t.expect(svg.startsWith("<svg")).toBe(true);
			for (const label of labels) {
				t.expect(svg).toContain(label);
			}
		}
		t.expect(console.log).toHaveBeenCalledWith(`[sim] Saved ${path.join(exportDir, AVG_WAIT_CHART)}`);
	});
});
