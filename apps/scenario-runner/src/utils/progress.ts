import chalk from "chalk";
import cliProgress from "cli-progress";

/**
 * Create a progress bar that counts finished scenarios.
 */
export function createScenarioProgressBar(label: string): cliProgress.SingleBar {
	return new cliProgress.SingleBar(
		{
			format: `${chalk.cyan(label)} ${chalk.gray("|")} {bar} ${chalk.gray("|")} {value}/{total} ${chalk.dim("{scenario}")}`,
			barCompleteChar: "█",
			barIncompleteChar: "░",
			hideCursor: true,
			clearOnComplete: false,
			stopOnComplete: true,
		},
		cliProgress.Presets.shades_classic,
	);
}

/**
 * Start a scenario progress bar.
 */
export function startProgressBar(bar: cliProgress.SingleBar, total: number): void {
	bar.start(total, 0, { scenario: "" });
}

/**
 * Advance a scenario progress bar by one finished scenario.
 */
export function incrementProgressBar(bar: cliProgress.SingleBar, scenario: string): void {
	bar.increment(1, { scenario });
}

/**
 * Stop a progress bar.
 */
export function stopProgressBar(bar: cliProgress.SingleBar): void {
	bar.stop();
}
