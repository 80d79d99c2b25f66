import { describe, expect, test } from "vitest";
import { bootstrapMean, mean, seededRandom } from "../../src/metrics/bootstrap.js";

describe("seededRandom", () => {
	test("is deterministic per seed and stays in [0, 1)", () => {
		const a = seededRandom(7);
		const b = seededRandom(7);
		for (let i = 0; i < 100; i++) {
			const value = a();
			expect(value).toBe(b());
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThan(1);
		}
	});
});

describe("bootstrapMean", () => {
	test("a constant sample has a degenerate interval", () => {
		expect(bootstrapMean([1, 1, 1, 1], { resamples: 200 })).toEqual({
			low: 1,
			high: 1,
			confidence_level: 0.95,
		});
	});

	test("the interval brackets the sample mean and is reproducible", () => {
		const values = [1, 0, 1, 1, 0, 1, 0, 1, 1, 1];
		const first = bootstrapMean(values, { resamples: 500 });
		const second = bootstrapMean(values, { resamples: 500 });

		expect(first).toEqual(second);
		expect(first.low).toBeGreaterThanOrEqual(0);
		expect(first.low).toBeLessThanOrEqual(mean(values));
		expect(first.high).toBeGreaterThanOrEqual(mean(values));
		expect(first.high).toBeLessThanOrEqual(1);
	});

	test("rejects an empty sample and an invalid level", () => {
		expect(() => bootstrapMean([])).toThrow("Cannot bootstrap an empty sample");
		expect(() => bootstrapMean([1], { confidenceLevel: 1 })).toThrow(/between 0 and 1/);
	});
});

describe("mean", () => {
	test("is NaN for an empty list", () => {
		expect(mean([])).toBeNaN();
		expect(mean([1, 2, 3])).toBe(2);
	});
});
