import { outputMarkup } from "../markup/codec.js";
import {
	type ElementNode,
	locateAll,
	type MarkupNode,
	nextSignificantSibling,
	parseMarkup,
	textContent,
} from "../markup/tree.js";
import { GADGET_TAG, OUTPUT_TAG } from "../markup/types.js";
import type { GadgetRegistry } from "../gadgets/types.js";

export interface ResolvedCall {
	gadget_id: string;
	input: string;
	output: string;
	/** Source offset the output was inserted at */
	offset: number;
}

export interface SpliceResult {
	text: string;
	calls: ResolvedCall[];
}

/** Gadget elements whose next significant sibling is not an output element */
export function findPendingCalls(nodes: MarkupNode[]): ElementNode[] {
	return locateAll(nodes, GADGET_TAG)
		.filter(({ siblings, index }) => {
			const next = nextSignificantSibling(siblings, index);
			return !(next?.type === "element" && next.name === OUTPUT_TAG);
		})
		.map(({ element }) => element);
}

/**
 * Invoke every pending call in `text` and insert its output right after the
 * call. Everything else in the text is kept byte for byte.
 * Throws MarkupSyntaxError when the text cannot be parsed.
 */
export async function resolvePendingCalls(
	text: string,
	registry: GadgetRegistry,
): Promise<SpliceResult> {
	const pending = findPendingCalls(parseMarkup(text));

	const calls: ResolvedCall[] = [];
	for (const element of pending) {
		const gadgetId = element.attrs.id ?? "";
		const input = textContent(element);
		const output = await registry.invoke(gadgetId, input);
		calls.push({ gadget_id: gadgetId, input, output, offset: element.end });
	}

	// Last offset first, so earlier offsets stay valid
	let spliced = text;
	for (const call of [...calls].reverse()) {
		spliced = `${spliced.slice(0, call.offset)}\n${outputMarkup(call.output)}\n${spliced.slice(call.offset)}`;
	}
	return { text: spliced, calls };
}
