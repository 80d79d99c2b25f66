import type {
	CompletionRequest,
	CompletionResponse,
	FinishReason,
	ProviderAdapter,
} from "../../src/llm/types.js";

export interface Reply {
	text: string;
	reason: FinishReason["reason"];
}

/** Answers requests from a queue of replies and records what it was sent */
export class ScriptedAdapter implements ProviderAdapter {
	readonly requests: CompletionRequest[] = [];

	constructor(
		readonly name: string,
		private readonly replies: Reply[] = [],
	) {}

	async complete(request: CompletionRequest): Promise<CompletionResponse> {
		this.requests.push(request);
		const reply = this.replies.shift() ?? { text: `from ${this.name}`, reason: "stop" };
		return {
			id: `resp-${this.requests.length}`,
			model: request.model,
			provider: this.name,
			text: reply.text,
			finish_reason: { reason: reply.reason },
			usage: { input_tokens: 3, output_tokens: 2, total_tokens: 5 },
		};
	}
}
