export type { MarkupOptions, MarkupSource } from "./codec.js";
export {
	fromModelMarkup,
	interactionMarkup,
	outputMarkup,
	resultMarkup,
	stripMarkup,
	toModelMarkup,
} from "./codec.js";
export type { ProtocolErrorCode } from "./errors.js";
export {
	ERR,
	MalformedProtocolError,
	MarkupSyntaxError,
	ProtocolError,
	ProtocolInputError,
} from "./errors.js";
export { getResult, getResultFromSentence } from "./result.js";
export type { ElementNode, MarkupNode, NodeLocation, TextNode } from "./tree.js";
export {
	decodeEntities,
	escapeAttribute,
	escapeText,
	findAll,
	findFirst,
	locateAll,
	nextSignificantSibling,
	parseMarkup,
	stringContent,
	textContent,
} from "./tree.js";
export type { Chain, DecodedMarkup, Example, FreeText, Interaction, Step } from "./types.js";
export { countInteractions, GADGET_TAG, OUTPUT_TAG, RESULT_TAG, Steps } from "./types.js";
