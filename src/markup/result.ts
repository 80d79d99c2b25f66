import { MarkupSyntaxError } from "./errors.js";
import { findFirst, parseMarkup, stringContent } from "./tree.js";
import { RESULT_TAG } from "./types.js";

const RESULT_PATTERN = new RegExp(`<${RESULT_TAG}>(.+?)</${RESULT_TAG}>`, "i");
const RESULT_SENTENCE = /final result is (.+?)\./gi;

/** Last "final result is X." phrase, keeping only what precedes an `=` */
export function getResultFromSentence(output: string): string {
	const matches = [...output.matchAll(RESULT_SENTENCE)];
	const last = matches.at(-1);
	if (!last) return "";
	const captured = last[1] ?? "";
	return (captured.split("=")[0] ?? "").trim();
}

function getResultFromTree(output: string): string {
	try {
		const tag = findFirst(parseMarkup(output), RESULT_TAG);
		return tag ? (stringContent(tag)?.trim() ?? "") : "";
	} catch (err) {
		if (err instanceof MarkupSyntaxError) return "";
		throw err;
	}
}

/**
 * Pull the final answer out of raw, possibly malformed model output.
 * Tries a direct tag match, then a full parse, then the result sentence.
 * Returns "" when no answer can be found.
 */
export function getResult(output: string): string {
	const match = RESULT_PATTERN.exec(output);
	if (match?.[1] !== undefined) {
		return match[1].trim();
	}

	const fromTree = getResultFromTree(output);
	if (fromTree) return fromTree;

	return getResultFromSentence(output);
}
