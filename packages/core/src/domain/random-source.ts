/**
 * A source of uniform random draws. Each simulation run owns one.
 */
export interface RandomSource {
	/** Uniform value in [0, 1). */
	next(): number;
	/** Uniform integer in [min, max], both inclusive. */
	nextInt(min: number, max: number): number;
}
