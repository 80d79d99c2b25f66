// ---------------------------------------------------------------------------
// Collaborators: the controller drives a generation primitive it does not own
// ---------------------------------------------------------------------------

export interface Tokenizer {
	readonly eosTokenId: number;
	encode(text: string): number[];
	/** Inverse of encode; the EOS id is dropped */
	decode(ids: readonly number[]): string;
}

/** Suffix-matching condition the generator evaluates per row */
export interface StopCondition {
	/** Text form of the suffix, for generators that take stop sequences */
	readonly closingTag: string;
	/** Per-row outcome of the last `check` */
	readonly mask: readonly boolean[];
	matches(sequence: readonly number[]): boolean;
	/** Evaluate every row; true when any row should stop */
	check(sequences: readonly (readonly number[])[]): boolean;
}

export interface StepRequest {
	/** Conditioning prompt of each running row */
	prompts: string[];
	/** Tokenized accumulated text of each running row */
	seeds: number[][];
	maxNewTokens: number;
	minNewTokens?: number;
	stop: StopCondition;
}

/**
 * One batched extension of the running rows.
 * Returns one full sequence per row, beginning with that row's seed.
 */
export interface StepGenerator {
	generateStep(request: StepRequest): Promise<number[][]>;
}

// ---------------------------------------------------------------------------
// Row state
// ---------------------------------------------------------------------------

export enum RowState {
	GENERATING = "generating",
	GADGET_PENDING = "gadget_pending",
	DONE = "done",
}

export type RowFinishReason = "end_of_sequence" | "budget_exhausted";

export interface SequenceState {
	text: string;
	state: RowState;
	finish_reason?: RowFinishReason;
}

export interface RowOutput {
	text: string;
	state: RowState;
	finish_reason: RowFinishReason;
}
