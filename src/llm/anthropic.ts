import Anthropic from "@anthropic-ai/sdk";
import type {
	CompletionRequest,
	CompletionResponse,
	FinishReason,
	ProviderAdapter,
	Usage,
} from "./types.js";

// ---------------------------------------------------------------------------
// SDK surface
// ---------------------------------------------------------------------------

export interface AnthropicMessageParams {
	model: string;
	max_tokens: number;
	messages: { role: "user" | "assistant"; content: string }[];
	system?: string;
	temperature?: number;
	stop_sequences?: string[];
}

export interface AnthropicMessage {
	id: string;
	model: string;
	content: { type: string; text?: string }[];
	stop_reason: string | null;
	usage: {
		input_tokens: number;
		output_tokens: number;
		cache_read_input_tokens?: number | null;
		cache_creation_input_tokens?: number | null;
	};
}

/** The part of `Anthropic#messages` the adapter calls */
export interface AnthropicMessagesApi {
	create(params: AnthropicMessageParams): Promise<AnthropicMessage>;
}

/**
 * Anthropic adapter using the Messages API.
 * The prefix goes in as an assistant prefill, which the model continues.
 */
export class AnthropicAdapter implements ProviderAdapter {
	readonly name = "anthropic";
	private api: AnthropicMessagesApi;

	constructor(apiKey: string, baseUrl?: string, api?: AnthropicMessagesApi) {
		this.api =
			api ??
			new Anthropic({
				apiKey,
				baseURL: baseUrl,
			}).messages;
	}

	async complete(request: CompletionRequest): Promise<CompletionResponse> {
		// The API rejects a prefill that ends in whitespace
		const prefix = request.prefix ?? "";
		const prefill = prefix.trimEnd();
		const trimmed = prefix.slice(prefill.length);

		const raw = await this.api.create(buildAnthropicRequest(request, prefill));
		let text = raw.content
			.filter((block) => block.type === "text")
			.map((block) => block.text ?? "")
			.join("");
		if (trimmed && text.startsWith(trimmed)) {
			text = text.slice(trimmed.length);
		}

		return parseAnthropicResponse(raw, text);
	}
}

// ---------------------------------------------------------------------------
// Request building
// ---------------------------------------------------------------------------

function buildAnthropicRequest(request: CompletionRequest, prefill: string): AnthropicMessageParams {
	const params: AnthropicMessageParams = {
		model: request.model,
		max_tokens: request.max_tokens ?? 4096,
		messages: [{ role: "user", content: request.prompt }],
	};

	if (prefill) {
		params.messages.push({ role: "assistant", content: prefill });
	}

	if (request.system) {
		params.system = request.system;
	}

	if (request.temperature !== undefined) {
		params.temperature = request.temperature;
	}

	if (request.stop_sequences?.length) {
		params.stop_sequences = request.stop_sequences;
	}

	return params;
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

function parseAnthropicResponse(raw: AnthropicMessage, text: string): CompletionResponse {
	const usage: Usage = {
		input_tokens: raw.usage.input_tokens,
		output_tokens: raw.usage.output_tokens,
		total_tokens: raw.usage.input_tokens + raw.usage.output_tokens,
	};
	if (raw.usage.cache_read_input_tokens != null) {
		usage.cache_read_tokens = raw.usage.cache_read_input_tokens;
	}
	if (raw.usage.cache_creation_input_tokens != null) {
		usage.cache_write_tokens = raw.usage.cache_creation_input_tokens;
	}

	return {
		id: raw.id,
		model: raw.model,
		provider: "anthropic",
		text,
		finish_reason: mapFinishReason(raw.stop_reason),
		usage,
	};
}

function mapFinishReason(stopReason: string | null): FinishReason {
	switch (stopReason) {
		case "end_turn":
			return { reason: "stop", raw: stopReason };
		case "stop_sequence":
			return { reason: "stop_sequence", raw: stopReason };
		case "max_tokens":
			return { reason: "length", raw: stopReason };
		default:
			return { reason: "other", raw: stopReason ?? undefined };
	}
}
