import { isOperatorNode, isSymbolNode, type MathNode, parse } from "mathjs";

export interface Tolerance {
	/** Relative tolerance, absorbing display rounding (default 1e-4) */
	relTol?: number;
	/** Absolute floor for values near zero (default 1e-9) */
	absTol?: number;
}

const CURRENCY = /[$€£¥]/g;
const PERCENT = /%/g;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;
const DIGIT_SEPARATOR = /(\d)[,_](?=\d{3}(?!\d))/g;
const DIGIT_GROUP_SPACE = /(\d) (?=\d{3}(?!\d))/g;
const NUMERIC_EXPRESSION = /^[\d.eE+\-*\/^()\s]+$/;

/** Strip the decorations that commonly surround a numeric answer */
export function normalizeNumericText(text: string): string {
	return text
		.trim()
		.replace(CURRENCY, "")
		.replace(PERCENT, "")
		.trim()
		.replace(TRAILING_PUNCTUATION, "")
		.replace(DIGIT_SEPARATOR, "$1")
		.replace(DIGIT_GROUP_SPACE, "$1")
		.trim();
}

/**
 * Parse an answer such as "1,234", "$12.50", "75%" or "3/4" as a number.
 * Returns undefined for anything that is not a finite numeric expression.
 */
export function parseNumericResult(text: string): number | undefined {
	const normalized = normalizeNumericText(text);
	if (!/\d/.test(normalized) || !NUMERIC_EXPRESSION.test(normalized)) {
		return undefined;
	}
	let node: MathNode;
	try {
		node = parse(normalized);
	} catch {
		return undefined;
	}
	// "2e" and "2(3)" are implicit products, not numbers
	const nonNumeric = node.filter((n) => isSymbolNode(n) || (isOperatorNode(n) && n.implicit));
	if (nonNumeric.length > 0) return undefined;

	let value: unknown;
	try {
		value = node.evaluate();
	} catch {
		return undefined;
	}
	return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function isClose(a: number, b: number, tolerance: Tolerance = {}): boolean {
	const relTol = tolerance.relTol ?? 1e-4;
	const absTol = tolerance.absTol ?? 1e-9;
	return Math.abs(a - b) <= Math.max(relTol * Math.max(Math.abs(a), Math.abs(b)), absTol);
}

/**
 * Compare a predicted answer with the expected one.
 * Numbers compare within tolerance. When either side is not numeric the
 * answers match only if they are the same non-empty text.
 */
export function areNumericResultsSame(
	predicted: string,
	expected: string,
	tolerance: Tolerance = {},
): boolean {
	const a = parseNumericResult(predicted);
	const b = parseNumericResult(expected);
	if (a !== undefined && b !== undefined) {
		return isClose(a, b, tolerance);
	}
	const trimmed = predicted.trim();
	return trimmed.length > 0 && trimmed === expected.trim();
}
