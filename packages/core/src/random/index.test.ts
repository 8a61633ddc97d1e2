import * as t from "vitest";
import { DEFAULT_SEED, deriveSeed, SeededRandom } from "./index.js";

t.describe("SeededRandom", () => {
	t.test("should produce the same sequence for the same seed", () => {
		const a = new SeededRandom(1234);
		const b = new SeededRandom(1234);
		const drawsA = Array.from({ length: 50 }, () => a.next());
		const drawsB = Array.from({ length: 50 }, () => b.next());
		t.expect(drawsA).toEqual(drawsB);
	});

	t.test("should produce different sequences for different seeds", () => {
		const a = new SeededRandom(1);
		const b = new SeededRandom(2);
		const drawsA = Array.from({ length: 10 }, () => a.next());
		const drawsB = Array.from({ length: 10 }, () => b.next());
		t.expect(drawsA).not.toEqual(drawsB);
	});

	t.test("should keep next() within [0, 1)", () => {
		const random = new SeededRandom(7);
		for (let i = 0; i < 10_000; i++) {
			const value = random.next();
			t.expect(value).toBeGreaterThanOrEqual(0);
			t.expect(value).toBeLessThan(1);
		}
	});

	t.test("should draw integers within the inclusive range and hit both ends", () => {
		const random = new SeededRandom(99);
		const seen = new Set<number>();
		for (let i = 0; i < 5_000; i++) {
			const value = random.nextInt(3, 7);
			t.expect(Number.isInteger(value)).toBe(true);
			t.expect(value).toBeGreaterThanOrEqual(3);
			t.expect(value).toBeLessThanOrEqual(7);
			seen.add(value);
		}
		t.expect([...seen].sort()).toEqual([3, 4, 5, 6, 7]);
	});

	t.test("should return the bound when min equals max", () => {
		const random = new SeededRandom(5);
		t.expect(random.nextInt(4, 4)).toBe(4);
	});

	t.test("should default to DEFAULT_SEED", () => {
		t.expect(new SeededRandom().seed).toBe(DEFAULT_SEED);
		t.expect(new SeededRandom().next()).toBe(new SeededRandom(DEFAULT_SEED).next());
	});
});

t.describe("deriveSeed", () => {
	t.test("should return the base seed for index 0", () => {
		t.expect(deriveSeed(42, 0)).toBe(42);
	});

	t.test("should give distinct seeds for distinct indices", () => {
		const seeds = new Set(Array.from({ length: 100 }, (_, i) => deriveSeed(42, i)));
		t.expect(seeds.size).toBe(100);
	});

	t.test("should stay within unsigned 32-bit range", () => {
		for (let i = 0; i < 20; i++) {
			const seed = deriveSeed(0xffffffff, i);
			t.expect(seed).toBeGreaterThanOrEqual(0);
			t.expect(seed).toBeLessThanOrEqual(0xffffffff);
		}
	});
});
