import { AnthropicAdapter } from "./anthropic.js";
import { OpenAIAdapter } from "./openai.js";
import type { CompletionRequest, CompletionResponse, ProviderAdapter } from "./types.js";

export interface ClientOptions {
	providers?: Record<string, ProviderAdapter>;
	defaultProvider?: string;
}

/**
 * Unified LLM client that routes requests to provider adapters.
 */
export class Client {
	private adapters: Map<string, ProviderAdapter>;
	private defaultProvider: string | undefined;

	constructor(options: ClientOptions = {}) {
		this.adapters = new Map(Object.entries(options.providers ?? {}));
		this.defaultProvider = options.defaultProvider;

		// Auto-set default if not specified
		if (!this.defaultProvider && this.adapters.size > 0) {
			this.defaultProvider = this.adapters.keys().next().value;
		}
	}

	/**
	 * Create a client from environment variables.
	 * Only providers with keys present are registered.
	 * The first registered provider becomes the default.
	 */
	static fromEnv(env: NodeJS.ProcessEnv = process.env): Client {
		const providers: Record<string, ProviderAdapter> = {};

		const anthropicKey = env.ANTHROPIC_API_KEY;
		if (anthropicKey) {
			providers.anthropic = new AnthropicAdapter(anthropicKey);
		}

		const openaiKey = env.OPENAI_API_KEY;
		if (openaiKey) {
			providers.openai = new OpenAIAdapter(openaiKey, env.OPENAI_BASE_URL);
		}

		return new Client({ providers });
	}

	/** List registered provider names */
	providers(): string[] {
		return [...this.adapters.keys()];
	}

	/** Get a specific adapter */
	adapter(name: string): ProviderAdapter | undefined {
		return this.adapters.get(name);
	}

	private resolveAdapter(request: CompletionRequest): ProviderAdapter {
		const providerName = request.provider ?? this.defaultProvider;
		if (!providerName) {
			throw new Error(
				"No provider specified and no default provider configured. " +
					"Set ANTHROPIC_API_KEY or OPENAI_API_KEY, or name a provider on the request.",
			);
		}
		const adapter = this.adapters.get(providerName);
		if (!adapter) {
			throw new Error(
				`Provider '${providerName}' is not registered. ` +
					`Available providers: ${[...this.adapters.keys()].join(", ")}`,
			);
		}
		return adapter;
	}

	/** Send a request and block until the model finishes */
	async complete(request: CompletionRequest): Promise<CompletionResponse> {
		return this.resolveAdapter(request).complete(request);
	}
}
