import type { RandomSource } from "../domain/random-source.js";

/** Seed used when a caller does not supply one. */
export const DEFAULT_SEED = 42;

/** Largest seed the generator distinguishes (unsigned 32-bit). */
export const MAX_SEED = 0xffffffff;

const GOLDEN_GAMMA = 0x9e3779b9;

/**
 * Seeded generator (mulberry32). Two instances built from the same seed
 * produce identical sequences.
 */
export class SeededRandom implements RandomSource {
	private state: number;

	constructor(public readonly seed: number = DEFAULT_SEED) {
		this.state = seed >>> 0;
	}

	next(): number {
		this.state = (this.state + 0x6d2b79f5) >>> 0;
		let z = this.state;
		z = Math.imul(z ^ (z >>> 15), z | 1);
		z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
		return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
	}

	nextInt(min: number, max: number): number {
		return min + Math.floor(this.next() * (max - min + 1));
	}
}

/**
 * Seed for the i-th member of a batch (scenario or replication).
 * Depends only on the base seed and the index, never on run order.
 */
export function deriveSeed(base: number, index: number): number {
	return (base + Math.imul(index, GOLDEN_GAMMA)) >>> 0;
}
