export interface ConfidenceInterval {
	low: number;
	high: number;
	confidence_level: number;
}

export interface BootstrapOptions {
	confidenceLevel?: number;
	resamples?: number;
	seed?: number;
}

/** Small seeded PRNG (mulberry32) so intervals are reproducible */
export function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export function mean(values: readonly number[]): number {
	if (values.length === 0) return Number.NaN;
	return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function quantile(sorted: readonly number[], q: number): number {
	const pos = q * (sorted.length - 1);
	const lo = Math.floor(pos);
	const hi = Math.ceil(pos);
	const a = sorted[lo] ?? Number.NaN;
	const b = sorted[hi] ?? Number.NaN;
	return a + (b - a) * (pos - lo);
}

/** Percentile bootstrap interval for the mean of `values` */
export function bootstrapMean(
	values: readonly number[],
	options: BootstrapOptions = {},
): ConfidenceInterval {
	const confidenceLevel = options.confidenceLevel ?? 0.95;
	const resamples = options.resamples ?? 9999;
	if (values.length === 0) {
		throw new Error("Cannot bootstrap an empty sample");
	}
	if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
		throw new Error(`Confidence level must be between 0 and 1, got ${confidenceLevel}`);
	}

	const random = seededRandom(options.seed ?? 0);
	const n = values.length;
	const means: number[] = [];
	for (let r = 0; r < resamples; r++) {
		let sum = 0;
		for (let i = 0; i < n; i++) {
			sum += values[Math.floor(random() * n)] ?? 0;
		}
		means.push(sum / n);
	}
	means.sort((a, b) => a - b);

	const alpha = (1 - confidenceLevel) / 2;
	return {
		low: quantile(means, alpha),
		high: quantile(means, 1 - alpha),
		confidence_level: confidenceLevel,
	};
}
