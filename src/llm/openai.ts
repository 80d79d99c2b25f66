import OpenAI from "openai";
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

export interface OpenAICompletionParams {
	model: string;
	prompt: string;
	max_tokens?: number;
	temperature?: number;
	stop?: string[];
}

export interface OpenAICompletion {
	id: string;
	model: string;
	choices: { text: string; finish_reason: string | null }[];
	usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

/** The part of `OpenAI#completions` the adapter calls */
export interface OpenAICompletionsApi {
	create(params: OpenAICompletionParams): Promise<OpenAICompletion>;
}

/**
 * OpenAI adapter using the legacy Completions API (/v1/completions).
 * Chat endpoints cannot continue a partial assistant turn verbatim; raw
 * completion of `prompt + prefix` can.
 */
export class OpenAIAdapter implements ProviderAdapter {
	readonly name = "openai";
	private api: OpenAICompletionsApi;

	constructor(apiKey: string, baseUrl?: string, api?: OpenAICompletionsApi) {
		this.api =
			api ??
			new OpenAI({
				apiKey,
				baseURL: baseUrl,
			}).completions;
	}

	async complete(request: CompletionRequest): Promise<CompletionResponse> {
		const raw = await this.api.create(buildCompletionParams(request));
		return parseCompletion(raw, request.model);
	}
}

// ---------------------------------------------------------------------------
// Request building
// ---------------------------------------------------------------------------

function buildCompletionParams(request: CompletionRequest): OpenAICompletionParams {
	const prompt = request.system ? `${request.system}\n\n${request.prompt}` : request.prompt;
	const params: OpenAICompletionParams = {
		model: request.model,
		prompt: prompt + (request.prefix ?? ""),
	};

	if (request.max_tokens !== undefined) {
		params.max_tokens = request.max_tokens;
	}

	if (request.temperature !== undefined) {
		params.temperature = request.temperature;
	}

	if (request.stop_sequences?.length) {
		// The endpoint accepts at most four
		params.stop = request.stop_sequences.slice(0, 4);
	}

	return params;
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

function parseCompletion(raw: OpenAICompletion, model: string): CompletionResponse {
	const choice = raw.choices[0];
	const usage: Usage = {
		input_tokens: raw.usage?.prompt_tokens ?? 0,
		output_tokens: raw.usage?.completion_tokens ?? 0,
		total_tokens: raw.usage?.total_tokens ?? 0,
	};

	return {
		id: raw.id,
		model: raw.model || model,
		provider: "openai",
		text: choice?.text ?? "",
		finish_reason: mapFinishReason(choice?.finish_reason ?? null),
		usage,
	};
}

/** "stop" covers both a natural end and a matched stop sequence */
function mapFinishReason(finishReason: string | null): FinishReason {
	switch (finishReason) {
		case "stop":
			return { reason: "stop", raw: finishReason };
		case "length":
			return { reason: "length", raw: finishReason };
		default:
			return { reason: "other", raw: finishReason ?? undefined };
	}
}
