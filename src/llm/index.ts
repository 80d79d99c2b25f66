export type {
	AnthropicMessage,
	AnthropicMessageParams,
	AnthropicMessagesApi,
} from "./anthropic.js";
export { AnthropicAdapter } from "./anthropic.js";
export type { ClientOptions } from "./client.js";
export { Client } from "./client.js";
export type {
	OpenAICompletion,
	OpenAICompletionParams,
	OpenAICompletionsApi,
} from "./openai.js";
export { OpenAIAdapter } from "./openai.js";
export type { ClientStepGeneratorOptions } from "./step-generator.js";
export { ClientStepGenerator, endsInsideGadgetCall } from "./step-generator.js";
export type {
	CompletionRequest,
	CompletionResponse,
	FinishReason,
	ProviderAdapter,
	Usage,
} from "./types.js";
export { addUsage } from "./types.js";
