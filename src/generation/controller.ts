import { createGadgetRegistry, type GadgetRegistryOptions } from "../gadgets/registry.js";
import type { Gadget, GadgetRegistry } from "../gadgets/types.js";
import { fromModelMarkup } from "../markup/codec.js";
import { MarkupSyntaxError, ProtocolError } from "../markup/errors.js";
import type { DecodedMarkup } from "../markup/types.js";
import {
	BUDGET_SAFETY_MARGIN,
	type BudgetOptions,
	DEFAULT_MAX_TOKENS,
	resolveTokenBudget,
} from "./budget.js";
import { GenerationEventEmitter } from "./events.js";
import { resolvePendingCalls } from "./splice.js";
import { GadgetCallStop } from "./stop.js";
import {
	type RowOutput,
	RowState,
	type SequenceState,
	type StepGenerator,
	type StepRequest,
	type Tokenizer,
} from "./types.js";

export interface GadgetControllerOptions {
	generator: StepGenerator;
	tokenizer: Tokenizer;
	gadgets: readonly Gadget[];
	/** Budget used when a call names neither new tokens nor an absolute length */
	defaultMaxTokens?: number;
	gadgetOptions?: GadgetRegistryOptions;
	events?: GenerationEventEmitter;
}

export type DecodedRowOutput = RowOutput &
	DecodedMarkup & {
		/** Set when the row's text violated the markup protocol; chain and result are then empty */
		error?: string;
	};

/**
 * Drives batched generation that suspends a row whenever it closes a gadget
 * call, splices the gadget's output into that row, and resumes the batch.
 *
 * All rows share one token budget: a round only starts while the longest
 * accumulated row still fits, so a single long row ends generation for the
 * whole batch.
 */
export class GadgetController {
	readonly events: GenerationEventEmitter;
	private readonly generator: StepGenerator;
	private readonly tokenizer: Tokenizer;
	private readonly gadgets: readonly Gadget[];
	private readonly gadgetOptions?: GadgetRegistryOptions;
	private readonly defaultMaxTokens: number;

	constructor(options: GadgetControllerOptions) {
		this.generator = options.generator;
		this.tokenizer = options.tokenizer;
		this.gadgets = options.gadgets;
		this.gadgetOptions = options.gadgetOptions;
		this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
		this.events = options.events ?? new GenerationEventEmitter();
	}

	async generate(prompts: readonly string[], budget: BudgetOptions = {}): Promise<RowOutput[]> {
		const promptLength = Math.max(0, ...prompts.map((p) => this.tokenizer.encode(p).length));
		const { maxTokens, minTokens } = resolveTokenBudget(
			budget,
			promptLength,
			this.defaultMaxTokens,
		);
		const registry = createGadgetRegistry(this.gadgets, this.gadgetOptions);
		const stop = new GadgetCallStop(this.tokenizer);
		const rows: SequenceState[] = prompts.map(() => ({ text: "", state: RowState.GENERATING }));

		this.events.emit("generate_start", {
			rows: rows.length,
			max_tokens: maxTokens,
			min_tokens: minTokens,
		});

		let round = 0;
		for (;;) {
			const running = rows.flatMap((row, index) => (row.state === RowState.DONE ? [] : [index]));
			if (running.length === 0) break;

			const seeds = running.map((index) => this.tokenizer.encode(rows[index]?.text ?? ""));
			const longest = Math.max(...seeds.map((seed) => seed.length));
			if (longest + BUDGET_SAFETY_MARGIN >= maxTokens) {
				this.events.emit("budget_exhausted", {
					round,
					longest,
					max_tokens: maxTokens,
					running: running.length,
				});
				break;
			}

			round++;
			this.events.emit("round_start", { round, running: running.length, longest });

			const request: StepRequest = {
				prompts: running.map((index) => prompts[index] ?? ""),
				seeds,
				maxNewTokens: maxTokens - longest,
				stop,
			};
			if (minTokens !== undefined) {
				request.minNewTokens = Math.max(0, minTokens - longest);
			}

			const outputs = await this.generator.generateStep(request);
			if (outputs.length !== running.length) {
				throw new Error(
					`Generator returned ${outputs.length} sequences for ${running.length} running rows`,
				);
			}
			stop.check(outputs);

			await Promise.all(
				running.map(async (rowIndex, slot) => {
					const row = rows[rowIndex];
					const output = outputs[slot];
					if (!row || !output) return;
					const seedLength = seeds[slot]?.length ?? 0;

					row.text = this.tokenizer.decode(output);
					if (stop.mask[slot]) {
						row.state = RowState.GADGET_PENDING;
						await this.resolveRow(registry, rowIndex, row);
						row.state = RowState.GENERATING;
					} else if (output.slice(seedLength).includes(this.tokenizer.eosTokenId)) {
						row.state = RowState.DONE;
						row.finish_reason = "end_of_sequence";
						this.events.emit("row_done", { round, length: output.length }, rowIndex);
					}
				}),
			);
		}

		const results: RowOutput[] = rows.map((row) => ({
			text: row.text,
			state: RowState.DONE,
			finish_reason: row.finish_reason ?? "budget_exhausted",
		}));
		this.events.emit("generate_end", {
			rounds: round,
			finish_reasons: results.map((r) => r.finish_reason),
		});
		return results;
	}

	/** Generate, then decode each row's markup into a chain and result */
	async generateDecoded(
		prompts: readonly string[],
		budget: BudgetOptions = {},
	): Promise<DecodedRowOutput[]> {
		const outputs = await this.generate(prompts, budget);
		return outputs.map((output, rowIndex) => this.decodeRow(output, rowIndex));
	}

	private decodeRow(output: RowOutput, rowIndex: number): DecodedRowOutput {
		try {
			return { ...output, ...fromModelMarkup(output.text) };
		} catch (err) {
			if (!(err instanceof ProtocolError)) throw err;
			this.events.emit("warning", { message: `Could not decode row: ${err.message}` }, rowIndex);
			return { ...output, chain: [], result: "", error: err.message };
		}
	}

	private async resolveRow(
		registry: GadgetRegistry,
		rowIndex: number,
		row: SequenceState,
	): Promise<void> {
		try {
			const { text, calls } = await resolvePendingCalls(row.text, registry);
			row.text = text;
			for (const call of calls) {
				this.events.emit(
					"gadget_call",
					{ gadget_id: call.gadget_id, input: call.input, output: call.output },
					rowIndex,
				);
			}
		} catch (err) {
			if (!(err instanceof MarkupSyntaxError)) throw err;
			// Unparseable text: leave the row as it is and let it keep generating
			this.events.emit(
				"warning",
				{ message: `Could not parse model output: ${err.message}` },
				rowIndex,
			);
		}
	}
}
