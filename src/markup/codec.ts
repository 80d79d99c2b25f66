import { MalformedProtocolError, ProtocolInputError } from "./errors.js";
import {
	type ElementNode,
	escapeAttribute,
	escapeText,
	isBlankText,
	type MarkupNode,
	parseMarkup,
	stringContent,
} from "./tree.js";
import {
	type Chain,
	type DecodedMarkup,
	type Example,
	GADGET_TAG,
	type Interaction,
	OUTPUT_TAG,
	RESULT_TAG,
	type Step,
	Steps,
} from "./types.js";

/** Either a chain with its result, or a whole example */
export interface MarkupSource {
	chain?: readonly Step[];
	result?: string;
	example?: Example;
}

export interface MarkupOptions {
	/** Skip interactions and the result tag, producing a tag-free reading view */
	omitTags?: boolean;
	/** Spell the result out as a sentence before the result tag */
	addResultSentence?: boolean;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function resolveSource(source: MarkupSource): { chain: readonly Step[]; result: string } {
	const { chain, result, example } = source;
	if (chain === undefined && example === undefined) {
		throw new ProtocolInputError("Either example or chain must be provided");
	}
	if (chain !== undefined && example !== undefined) {
		throw new ProtocolInputError("Only one of example or chain can be provided");
	}
	if (chain !== undefined) {
		if (result === undefined) {
			throw new ProtocolInputError("If chain is provided, result must be provided");
		}
		return { chain, result };
	}
	if (result !== undefined) {
		throw new ProtocolInputError("A result can only be provided together with a chain");
	}
	if (example === undefined) {
		throw new ProtocolInputError("Either example or chain must be provided");
	}
	return { chain: example.chain, result: example.result };
}

export function interactionMarkup(interaction: Interaction): string {
	return (
		`\n<${GADGET_TAG} id="${escapeAttribute(interaction.gadget_id)}">` +
		`${escapeText(interaction.inputs)}</${GADGET_TAG}>\n` +
		outputMarkup(interaction.outputs) +
		"\n"
	);
}

export function outputMarkup(outputs: string): string {
	return `<${OUTPUT_TAG}>${escapeText(outputs)}</${OUTPUT_TAG}>`;
}

export function resultMarkup(result: string): string {
	return `<${RESULT_TAG}>${escapeText(result)}</${RESULT_TAG}>`;
}

/**
 * Serialize a chain and its result to model markup.
 * Free text is emitted verbatim; every interaction becomes an adjacent
 * gadget/output tag pair.
 */
export function toModelMarkup(source: MarkupSource, options: MarkupOptions = {}): string {
	const { chain, result } = resolveSource(source);

	let text = "";
	for (const step of chain) {
		if (step.kind === "text") {
			text += step.text;
		} else if (!options.omitTags) {
			text += interactionMarkup(step);
		}
	}

	if (options.addResultSentence) {
		text += `Final result is ${result}.\n`;
	}

	if (!options.omitTags) {
		if (text.trim().length > 0 && !text.endsWith("\n")) {
			text += "\n";
		}
		text += resultMarkup(result);
	}

	return text;
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function describeNode(node: MarkupNode): string {
	return node.type === "element" ? node.name : "#text";
}

function decodeInteraction(tag: ElementNode, next: MarkupNode | undefined): Interaction {
	const inputs = stringContent(tag)?.trim() ?? "";

	let outputs = "";
	if (next !== undefined) {
		if (next.type !== "element" || next.name !== OUTPUT_TAG) {
			throw new MalformedProtocolError(
				`Expected ${OUTPUT_TAG} tag after ${GADGET_TAG} tag, got '${describeNode(next)}'`,
				{ offset: next.start },
			);
		}
		outputs = stringContent(next)?.trim() ?? "";
	}

	return Steps.interaction(tag.attrs.id ?? "", inputs, outputs);
}

/**
 * Parse model markup back into a chain and its final result.
 * When several result tags occur the last one wins.
 */
export function fromModelMarkup(markup: string | MarkupNode[]): DecodedMarkup {
	const parsed = typeof markup === "string" ? parseMarkup(markup) : markup;
	const nodes = parsed.filter((node) => !isBlankText(node));

	const chain: Chain = [];
	let result = "";

	nodes.forEach((node, index) => {
		if (node.type === "text") {
			chain.push(Steps.text(node.value.trim()));
			return;
		}
		if (node.name === GADGET_TAG) {
			chain.push(decodeInteraction(node, nodes[index + 1]));
		} else if (node.name === RESULT_TAG) {
			const value = stringContent(node);
			if (value !== undefined) result = value.trim();
		}
		// Output tags were consumed with their gadget tag; anything else carries no protocol meaning
	});

	return { chain, result };
}

/** Top-level text only: drops every tag together with its content */
export function stripMarkup(markup: string | MarkupNode[]): string {
	const nodes = typeof markup === "string" ? parseMarkup(markup) : markup;
	return nodes.flatMap((node) => (node.type === "text" ? [node.value] : [])).join("");
}
