import * as fs from "node:fs";
import * as path from "node:path";
import type { ExperimentResults } from "./types.js";

/**
 * Write the experiment results as JSON, creating parent directories.
 * Returns the absolute path of the written file.
 */
export function writeResults(outputPath: string, results: ExperimentResults): string {
	const filePath = path.resolve(outputPath);
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	fs.writeFileSync(filePath, `${JSON.stringify(results, null, 2)}\n`);
	console.log(`[sim] Results written to ${filePath}`);
	return filePath;
}
