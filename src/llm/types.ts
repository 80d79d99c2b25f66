// ---------------------------------------------------------------------------
// Request / Response
// ---------------------------------------------------------------------------

/** Raw text continuation: the model extends `prompt + prefix` */
export interface CompletionRequest {
	model: string;
	prompt: string;
	/** Text the model has already produced; the response continues it */
	prefix?: string;
	provider?: string;
	system?: string;
	max_tokens?: number;
	temperature?: number;
	stop_sequences?: string[];
}

export interface FinishReason {
	reason: "stop" | "stop_sequence" | "length" | "other";
	raw?: string;
}

export interface Usage {
	input_tokens: number;
	output_tokens: number;
	total_tokens: number;
	cache_read_tokens?: number;
	cache_write_tokens?: number;
}

export function addUsage(a: Usage, b: Usage): Usage {
	return {
		input_tokens: a.input_tokens + b.input_tokens,
		output_tokens: a.output_tokens + b.output_tokens,
		total_tokens: a.total_tokens + b.total_tokens,
		cache_read_tokens: addOptional(a.cache_read_tokens, b.cache_read_tokens),
		cache_write_tokens: addOptional(a.cache_write_tokens, b.cache_write_tokens),
	};
}

function addOptional(a: number | undefined, b: number | undefined): number | undefined {
	if (a === undefined && b === undefined) return undefined;
	return (a ?? 0) + (b ?? 0);
}

export interface CompletionResponse {
	id: string;
	model: string;
	provider: string;
	/** Continuation only, without the prompt or prefix */
	text: string;
	finish_reason: FinishReason;
	usage: Usage;
}

// ---------------------------------------------------------------------------
// Provider adapter interface
// ---------------------------------------------------------------------------

export interface ProviderAdapter {
	name: string;
	complete(request: CompletionRequest): Promise<CompletionResponse>;
}
