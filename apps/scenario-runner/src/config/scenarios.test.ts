import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ErrorCode, InvalidConfigurationError } from "@callcenter-sim/core";
import * as t from "vitest";
import { ScenarioFileError } from "./errors.js";
import { DEFAULT_SCENARIOS_FILE, loadScenarioFile, parseScenarioFile } from "./scenarios.js";

const scenario = (label: string, numAgents: number) => ({
	label,
	numAgents,
	arrivalProbPerStep: 0.5,
	serviceTimeRange: { min: 3, max: 7 },
	simSteps: 2000,
});

function expectFileError(content: string, message: string): void {
	try {
		parseScenarioFile("scenarios.json", content);
		t.expect.unreachable("should have thrown");
	} catch (e) {
		t.expect(e).toBeInstanceOf(ScenarioFileError);
		t.expect((e as ScenarioFileError).code).toBe(ErrorCode.SCENARIO_FILE_INVALID);
		t.expect((e as ScenarioFileError).message).toBe(message);
	}
}

t.describe("parseScenarioFile", () => {
	t.test("should parse a list of scenarios", () => {
		const content = JSON.stringify({ scenarios: [scenario("a", 1), scenario("b", 2)] });
		t.expect(parseScenarioFile("scenarios.json", content)).toEqual([scenario("a", 1), scenario("b", 2)]);
	});

	t.test("should drop unknown fields", () => {
		const content = JSON.stringify({ scenarios: [{ ...scenario("a", 1), color: "red" }] });
		t.expect(parseScenarioFile("scenarios.json", content)).toEqual([scenario("a", 1)]);
	});

	t.test("should reject invalid JSON", () => {
		try {
			parseScenarioFile("scenarios.json", "{ not json");
			t.expect.unreachable("should have thrown");
		} catch (e) {
			t.expect(e).toBeInstanceOf(ScenarioFileError);
			t.expect((e as ScenarioFileError).message).toMatch(/^scenarios\.json: invalid JSON \(/);
		}
	});

	t.test("should reject a file without a scenarios array", () => {
		expectFileError(JSON.stringify([scenario("a", 1)]), 'scenarios.json: expected an object with a "scenarios" array');
	});

	t.test("should reject an empty scenario list", () => {
		expectFileError(JSON.stringify({ scenarios: [] }), "scenarios.json: no scenarios defined");
	});

	t.test("should reject an entry with missing fields", () => {
		const content = JSON.stringify({ scenarios: [scenario("a", 1), { label: "b", numAgents: 2 }] });
		expectFileError(content, "scenarios.json: scenario #1 is missing required fields");
	});

	t.test("should reject duplicate labels", () => {
		const content = JSON.stringify({ scenarios: [scenario("a", 1), scenario("a", 2)] });
		expectFileError(content, 'scenarios.json: duplicate scenario label "a"');
	});

	t.test("should reject out-of-range values as invalid configuration", () => {
		const content = JSON.stringify({ scenarios: [scenario("a", 0)] });
		t.expect(() => parseScenarioFile("scenarios.json", content)).toThrow(InvalidConfigurationError);
	});
});

t.describe("loadScenarioFile", () => {
	let tmpDir: string;

	t.beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scenario-file-"));
	});

	t.afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	t.test("should load the bundled default scenarios", () => {
		const scenarios = loadScenarioFile(DEFAULT_SCENARIOS_FILE);
		t.expect(scenarios.map((s) => s.label)).toEqual(["3_agents", "4_agents", "5_agents"]);
		t.expect(scenarios.map((s) => s.numAgents)).toEqual([3, 4, 5]);
		for (const s of scenarios) {
			t.expect(s.arrivalProbPerStep).toBe(0.5);
			t.expect(s.serviceTimeRange).toEqual({ min: 3, max: 7 });
			t.expect(s.simSteps).toBe(2000);
		}
	});

	t.test("should load a file from disk", () => {
		const filePath = path.join(tmpDir, "custom.json");
		fs.writeFileSync(filePath, JSON.stringify({ scenarios: [scenario("custom", 6)] }));
		t.expect(loadScenarioFile(filePath)).toEqual([scenario("custom", 6)]);
	});

	t.test("should report a missing file", () => {
		const filePath = path.join(tmpDir, "missing.json");
		t.expect(() => loadScenarioFile(filePath)).toThrow(`${filePath}: file not found`);
	});
});
