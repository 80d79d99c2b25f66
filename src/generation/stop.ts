import { GADGET_TAG } from "../markup/types.js";
import type { StopCondition, Tokenizer } from "./types.js";

/** Stops a row once its most recent tokens spell the closing gadget tag */
export class GadgetCallStop implements StopCondition {
	readonly closingTag = `</${GADGET_TAG}>`;
	readonly closingTagIds: readonly number[];
	mask: boolean[] = [];

	constructor(tokenizer: Pick<Tokenizer, "encode">) {
		this.closingTagIds = tokenizer.encode(this.closingTag);
	}

	matches(sequence: readonly number[]): boolean {
		const n = this.closingTagIds.length;
		if (n === 0 || sequence.length < n) return false;
		const offset = sequence.length - n;
		return this.closingTagIds.every((id, i) => sequence[offset + i] === id);
	}

	check(sequences: readonly (readonly number[])[]): boolean {
		this.mask = sequences.map((sequence) => this.matches(sequence));
		return this.mask.some(Boolean);
	}
}
