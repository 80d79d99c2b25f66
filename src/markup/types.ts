export const GADGET_TAG = "gadget";
export const OUTPUT_TAG = "output";
export const RESULT_TAG = "result";

/** A span of free-form reasoning text */
export interface FreeText {
	kind: "text";
	text: string;
}

/** A resolved gadget call: what was asked and what came back */
export interface Interaction {
	kind: "interaction";
	gadget_id: string;
	inputs: string;
	outputs: string;
}

export type Step = FreeText | Interaction;

/** Ordered reasoning trace */
export type Chain = Step[];

/** A complete labeled instance */
export interface Example {
	readonly chain: readonly Step[];
	readonly result: string;
}

export interface DecodedMarkup {
	chain: Chain;
	/** Empty string when no result tag was found */
	result: string;
}

/** Convenience constructors for chain steps */
export const Steps = {
	text(text: string): FreeText {
		return { kind: "text", text };
	},
	interaction(gadgetId: string, inputs: string, outputs: string): Interaction {
		return { kind: "interaction", gadget_id: gadgetId, inputs, outputs };
	},
};

/** Number of gadget interactions in a chain */
export function countInteractions(chain: readonly Step[]): number {
	return chain.filter((step) => step.kind === "interaction").length;
}
