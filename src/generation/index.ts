export type { BudgetOptions, TokenBudget } from "./budget.js";
export {
	BUDGET_SAFETY_MARGIN,
	DEFAULT_MAX_TOKENS,
	resolveTokenBudget,
} from "./budget.js";
export type { DecodedRowOutput, GadgetControllerOptions } from "./controller.js";
export { GadgetController } from "./controller.js";
export type { EventListener, GenerationEvent, GenerationEventKind } from "./events.js";
export { GenerationEventEmitter } from "./events.js";
export type { ResolvedCall, SpliceResult } from "./splice.js";
export { findPendingCalls, resolvePendingCalls } from "./splice.js";
export { GadgetCallStop } from "./stop.js";
export { CharTokenizer } from "./tokenizer.js";
export type {
	RowFinishReason,
	RowOutput,
	SequenceState,
	StepGenerator,
	StepRequest,
	StopCondition,
	Tokenizer,
} from "./types.js";
export { RowState } from "./types.js";
