#!/usr/bin/env node
import { type ReplicationSummary, type RunResult, runReplications } from "@callcenter-sim/core";
import chalk from "chalk";
import { Command } from "commander";
import { loadEnvFile, readRunnerEnv } from "../config/env.js";
import { writeChartData } from "../output/chart-data.js";
import { writeCharts } from "../output/charts.js";
import { printResults } from "../output/formatter.js";
import { writeResults } from "../output/writer.js";
import { buildExperimentResults } from "../results/build.js";
import { runScenarios } from "../scenarios/index.js";
import { createScenarioProgressBar, incrementProgressBar, startProgressBar, stopProgressBar } from "../utils/progress.js";
import { runWithWorkers } from "./coordinator.js";
import { type CliOptions, type RunSettings, resolveRunSettings } from "./options.js";
import { getWorkerCount, parseWorkersOption } from "./worker-types.js";

function printConfiguration(settings: RunSettings, workerCount: number, workersOption?: string): void {
	console.log(chalk.bold.blue("╔══════════════════════════════════════╗"));
	console.log(chalk.bold.blue("║       CALL CENTER SIMULATION         ║"));
	console.log(chalk.bold.blue("╚══════════════════════════════════════╝"));
	console.log("");
	console.log(chalk.bold("Configuration:"));
	console.log(`  Scenarios:   ${chalk.dim(settings.scenariosFile)}`);
	for (const scenario of settings.scenarios) {
		console.log(
			`    ${chalk.cyan(scenario.label)}: ${scenario.numAgents} agents, p=${scenario.arrivalProbPerStep}, service ${scenario.serviceTimeRange.min}-${scenario.serviceTimeRange.max}, ${scenario.simSteps} steps`,
		);
	}
	console.log(`  Seed:        ${chalk.bold(settings.seed)}`);
	if (settings.replications > 1) {
		console.log(`  Replications: ${settings.replications}`);
	}
	if (settings.output) {
		console.log(`  Output:      ${chalk.dim(settings.output)}`);
	}
	if (settings.exportDir) {
		console.log(`  Charts:      ${chalk.dim(settings.exportDir)}`);
	}
	if (workerCount > 1) {
		console.log(`  Workers:     ${chalk.cyan(workerCount)} ${workersOption === "auto" ? "(auto-detected)" : ""}`);
	}
	console.log("");
}

async function main(cli: CliOptions): Promise<void> {
	loadEnvFile();
	const settings = resolveRunSettings(cli, readRunnerEnv());
	const workerCount = cli.workers ? Math.min(getWorkerCount(parseWorkersOption(cli.workers)), settings.scenarios.length) : 1;

	printConfiguration(settings, workerCount, cli.workers);

	const bar = createScenarioProgressBar("Scenarios");
	startProgressBar(bar, settings.scenarios.length);
	const onScenarioComplete = (index: number) => incrementProgressBar(bar, settings.scenarios[index].label);

	let runs: RunResult[];
	try {
		runs =
			workerCount > 1
				? await runWithWorkers(settings.scenarios, { seed: settings.seed, workerCount, onScenarioComplete })
				: runScenarios(settings.scenarios, {
						seed: settings.seed,
						onScenarioComplete: ({ index }) => onScenarioComplete(index),
					});
	} finally {
		stopProgressBar(bar);
	}

	let replications: ReplicationSummary[] | undefined;
	if (settings.replications > 1) {
		replications = settings.scenarios.map((scenario) =>
			runReplications(scenario, { replications: settings.replications, seed: settings.seed }),
		);
	}

	const results = buildExperimentResults(runs, { seed: settings.seed, baseline: settings.baseline, replications });

	console.log("");
	printResults(results);

	if (settings.output) {
		console.log("");
		writeResults(settings.output, results);
	}
	if (settings.exportDir) {
		console.log("");
		writeChartData(settings.exportDir, results);
		await writeCharts(settings.exportDir, results);
	}

	console.log("");
	console.log(chalk.green("✓ Done"));
}

const program = new Command();

program
	.name("simulate")
	.description("Simulate a multi-agent call center queue across scenarios")
	.version("0.1.0")
	.option("--scenarios <path>", "JSON file of scenario definitions (default: config/scenarios.json)")
	.option("--agents <list>", "Comma-separated agent counts; builds one scenario per count from the first scenario's parameters")
	.option("--arrival-prob <p>", "Override the per-step arrival probability for every scenario")
	.option("--service-min <steps>", "Override the minimum service time for every scenario")
	.option("--service-max <steps>", "Override the maximum service time for every scenario")
	.option("--steps <count>", "Override the number of simulated steps for every scenario")
	.option("--seed <number>", "Base random seed (default: SIM_SEED or 42)")
	.option("--replications <count>", "Also average each scenario over this many seeded runs", "1")
	.option("--baseline <label>", "Scenario the others are compared against (default: the first)")
	.option("--output <path>", "Path to write JSON results")
	.option("--export-dir <dir>", "Directory to write SVG charts and their CSV data (default: SIM_EXPORT_DIR)")
	.option("--workers <count>", "Number of worker processes (or 'auto' for CPU count). Distributes scenarios across workers.")
	.action(async (cli: CliOptions) => {
		try {
			await main(cli);
		} catch (error) {
			console.error(chalk.red(`[sim] Error: ${error instanceof Error ? error.message : String(error)}`));
			process.exit(1);
		}
	});

program.parseAsync().catch((error: unknown) => {
	console.error(chalk.red(`[sim] Error: ${error instanceof Error ? error.message : String(error)}`));
	process.exit(1);
});
