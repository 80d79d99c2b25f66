import type { StepGenerator, StepRequest, Tokenizer } from "../../src/generation/types.js";

/** A chunk the row appends in one round; bare strings end in EOS unless they close a gadget call */
export type ScriptChunk = string | { text: string; eos: boolean };

/**
 * Replays a fixed script per prompt. Each round the row's seed is extended by
 * its next chunk, and a row with no chunks left emits EOS.
 */
export class ScriptedGenerator implements StepGenerator {
	readonly requests: StepRequest[] = [];
	private readonly cursor = new Map<string, number>();

	constructor(
		private readonly tokenizer: Tokenizer,
		private readonly scripts: Record<string, ScriptChunk[]>,
	) {}

	async generateStep(request: StepRequest): Promise<number[][]> {
		this.requests.push({ ...request, seeds: request.seeds.map((seed) => [...seed]) });
		return request.prompts.map((prompt, i) => {
			const seed = request.seeds[i] ?? [];
			const at = this.cursor.get(prompt) ?? 0;
			this.cursor.set(prompt, at + 1);

			const chunk = this.scripts[prompt]?.[at];
			if (chunk === undefined) return [...seed, this.tokenizer.eosTokenId];

			const text = typeof chunk === "string" ? chunk : chunk.text;
			const eos = typeof chunk === "string" ? !chunk.endsWith("</gadget>") : chunk.eos;
			const ids = [...seed, ...this.tokenizer.encode(text)];
			if (eos) ids.push(this.tokenizer.eosTokenId);
			return ids;
		});
	}
}
