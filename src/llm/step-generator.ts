import type { StepGenerator, StepRequest, Tokenizer } from "../generation/types.js";
import { GADGET_TAG } from "../markup/types.js";
import type { Client } from "./client.js";
import { addUsage, type CompletionResponse, type Usage } from "./types.js";

export interface ClientStepGeneratorOptions {
	client: Client;
	tokenizer: Tokenizer;
	model: string;
	provider?: string;
	system?: string;
	temperature?: number;
}

const OPEN_GADGET = `<${GADGET_TAG}`;
const CLOSE_GADGET = `</${GADGET_TAG}>`;

/** True when the last gadget tag in `text` was opened but not closed */
export function endsInsideGadgetCall(text: string): boolean {
	return text.lastIndexOf(OPEN_GADGET) > text.lastIndexOf(CLOSE_GADGET);
}

/**
 * Extends each running row with one hosted-model completion.
 *
 * Rows are sent concurrently, each continuing its own prefix. Providers drop
 * the matched stop sequence from their output, so it is put back to let the
 * stop condition see the closed call. Budgets count tokenizer units;
 * `minNewTokens` has no hosted counterpart and is not sent.
 */
export class ClientStepGenerator implements StepGenerator {
	private readonly options: ClientStepGeneratorOptions;
	private totalUsage: Usage = { input_tokens: 0, output_tokens: 0, total_tokens: 0 };

	constructor(options: ClientStepGeneratorOptions) {
		this.options = options;
	}

	/** Usage summed over every completion so far */
	get usage(): Usage {
		return { ...this.totalUsage };
	}

	async generateStep(request: StepRequest): Promise<number[][]> {
		return Promise.all(
			request.prompts.map((prompt, i) => this.extendRow(prompt, request.seeds[i] ?? [], request)),
		);
	}

	private async extendRow(
		prompt: string,
		seed: number[],
		request: StepRequest,
	): Promise<number[]> {
		const { client, tokenizer, model, provider, system, temperature } = this.options;
		const prefix = tokenizer.decode(seed);

		const response = await client.complete({
			model,
			provider,
			system,
			temperature,
			prompt,
			prefix,
			max_tokens: request.maxNewTokens,
			stop_sequences: [request.stop.closingTag],
		});
		this.totalUsage = addUsage(this.totalUsage, response.usage);

		const continuation = tokenizer.encode(response.text);
		switch (classifyStop(response, prefix)) {
			case "gadget_call":
				return [...seed, ...continuation, ...tokenizer.encode(request.stop.closingTag)];
			case "truncated":
				return [...seed, ...continuation];
			case "finished":
				return [...seed, ...continuation, tokenizer.eosTokenId];
		}
	}
}

type StopKind = "gadget_call" | "truncated" | "finished";

function classifyStop(response: CompletionResponse, prefix: string): StopKind {
	switch (response.finish_reason.reason) {
		case "stop_sequence":
			return "gadget_call";
		case "length":
			return "truncated";
		case "stop": {
			// Some providers report a matched stop sequence as a plain stop
			return endsInsideGadgetCall(prefix + response.text) ? "gadget_call" : "finished";
		}
		default:
			return "finished";
	}
}
