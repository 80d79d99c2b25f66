import type { Tokenizer } from "./types.js";

/**
 * One token per UTF-16 code unit.
 * Stands in for a vocabulary when the generator is a hosted model that only
 * speaks text, so token budgets become character budgets.
 */
export class CharTokenizer implements Tokenizer {
	readonly eosTokenId = -1;

	encode(text: string): number[] {
		const ids: number[] = [];
		for (let i = 0; i < text.length; i++) {
			ids.push(text.charCodeAt(i));
		}
		return ids;
	}

	decode(ids: readonly number[]): string {
		return ids
			.filter((id) => id !== this.eosTokenId)
			.map((id) => String.fromCharCode(id))
			.join("");
	}
}
