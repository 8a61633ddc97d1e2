/**
 * Distribution summary of per-call wait times, in steps.
 */
export interface WaitStats {
	min: number;
	max: number;
	avg: number;
	p50: number;
	p95: number;
	p99: number;
}

/**
 * Arithmetic mean, 0 for an empty sequence.
 */
export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	let sum = 0;
	for (const value of values) sum += value;
	return sum / values.length;
}

/**
 * Largest value, 0 for an empty sequence.
 * Loops rather than spreading into Math.max so long series don't overflow the stack.
 */
export function max(values: readonly number[]): number {
	let result = 0;
	for (let i = 0; i < values.length; i++) {
		if (i === 0 || values[i] > result) result = values[i];
	}
	return result;
}

/**
 * Calculate wait-time statistics. Returns null if nothing was served.
 */
export function calculateWaitStats(values: readonly number[]): WaitStats | null {
	if (values.length === 0) return null;
	const sorted = [...values].sort((a, b) => a - b);
	return {
		min: sorted[0],
		max: sorted[sorted.length - 1],
		avg: mean(sorted),
		p50: sorted[Math.floor((sorted.length - 1) * 0.5)] ?? 0,
		p95: sorted[Math.floor((sorted.length - 1) * 0.95)] ?? 0,
		p99: sorted[Math.floor((sorted.length - 1) * 0.99)] ?? 0,
	};
}

/**
 * Relative reduction from baseline to value, in percent. 0 when the baseline is 0.
 */
export function percentImprovement(baseline: number, value: number): number {
	return baseline ? ((baseline - value) / baseline) * 100 : 0;
}
