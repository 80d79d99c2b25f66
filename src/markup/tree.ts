import { MarkupSyntaxError } from "./errors.js";

// ---------------------------------------------------------------------------
// Node model
// ---------------------------------------------------------------------------

export interface TextNode {
	type: "text";
	/** Text with character references decoded */
	value: string;
	start: number;
	end: number;
}

export interface ElementNode {
	type: "element";
	/** Lower-cased tag name */
	name: string;
	attrs: Record<string, string>;
	children: MarkupNode[];
	/** Offset of the opening `<` */
	start: number;
	/** Offset just past the closing tag, or where the element was implicitly closed */
	end: number;
}

export type MarkupNode = TextNode | ElementNode;

/** An element together with the sibling list it lives in */
export interface NodeLocation {
	element: ElementNode;
	siblings: MarkupNode[];
	index: number;
}

const VOID_ELEMENTS = new Set(["br", "hr", "img", "input", "meta", "link", "wbr"]);

const TAG_NAME = /[A-Za-z][A-Za-z0-9_:.-]*/y;
const ATTR_NAME = /[^\s"'>/=]+/y;
const UNQUOTED_VALUE = /[^\s>]+/y;
const WHITESPACE = /\s*/y;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface OpenTag {
	kind: "open";
	name: string;
	attrs: Record<string, string>;
	selfClosing: boolean;
	end: number;
}

interface CloseTag {
	kind: "close";
	name: string;
	end: number;
}

function matchAt(pattern: RegExp, source: string, pos: number): string | undefined {
	pattern.lastIndex = pos;
	const match = pattern.exec(source);
	return match ? match[0] : undefined;
}

function skipWhitespace(source: string, pos: number): number {
	return pos + (matchAt(WHITESPACE, source, pos) ?? "").length;
}

/**
 * Read a tag starting at the `<` at `lt`.
 * Returns undefined when the text there is not a tag, so the caller keeps it as text.
 */
function readTag(source: string, lt: number): OpenTag | CloseTag | undefined {
	if (source[lt + 1] === "/") {
		const name = matchAt(TAG_NAME, source, lt + 2);
		if (!name) return undefined;
		const pos = skipWhitespace(source, lt + 2 + name.length);
		if (source[pos] !== ">") return undefined;
		return { kind: "close", name: name.toLowerCase(), end: pos + 1 };
	}

	const name = matchAt(TAG_NAME, source, lt + 1);
	if (!name) return undefined;
	let pos = lt + 1 + name.length;
	const next = source[pos];
	if (next === undefined || !(next === ">" || next === "/" || /\s/.test(next))) {
		return undefined;
	}

	const attrs: Record<string, string> = {};
	for (;;) {
		pos = skipWhitespace(source, pos);
		if (pos >= source.length) return undefined;
		if (source[pos] === ">") {
			return { kind: "open", name: name.toLowerCase(), attrs, selfClosing: false, end: pos + 1 };
		}
		if (source.startsWith("/>", pos)) {
			return { kind: "open", name: name.toLowerCase(), attrs, selfClosing: true, end: pos + 2 };
		}
		if (source[pos] === "/") {
			pos++;
			continue;
		}

		const attrName = matchAt(ATTR_NAME, source, pos);
		if (!attrName) return undefined;
		pos = skipWhitespace(source, pos + attrName.length);

		let value = "";
		if (source[pos] === "=") {
			pos = skipWhitespace(source, pos + 1);
			const quote = source[pos];
			if (quote === '"' || quote === "'") {
				const close = source.indexOf(quote, pos + 1);
				if (close === -1) {
					throw new MarkupSyntaxError(
						`Unterminated value for attribute '${attrName}' in <${name}> at offset ${lt}`,
						{ offset: lt, tag: name, attribute: attrName },
					);
				}
				value = source.slice(pos + 1, close);
				pos = close + 1;
			} else {
				const unquoted = matchAt(UNQUOTED_VALUE, source, pos) ?? "";
				value = unquoted;
				pos += unquoted.length;
			}
		}
		attrs[attrName.toLowerCase()] = decodeEntities(value);
	}
}

/**
 * Parse tagged text into a node list.
 * Tolerant in the way HTML parsers are: stray closing tags are dropped,
 * unclosed elements close at end of input, and a `<` that does not start a tag is text.
 * Throws MarkupSyntaxError for a start tag whose quoted attribute value never ends.
 */
export function parseMarkup(source: string): MarkupNode[] {
	const root: MarkupNode[] = [];
	const stack: ElementNode[] = [];
	let textStart = 0;
	let pos = 0;

	const container = (): MarkupNode[] => stack.at(-1)?.children ?? root;

	const flushText = (end: number): void => {
		if (end > textStart) {
			container().push({
				type: "text",
				value: decodeEntities(source.slice(textStart, end)),
				start: textStart,
				end,
			});
		}
	};

	while (pos < source.length) {
		const lt = source.indexOf("<", pos);
		if (lt === -1) break;

		const tag = readTag(source, lt);
		if (!tag) {
			pos = lt + 1;
			continue;
		}

		flushText(lt);
		if (tag.kind === "open") {
			const element: ElementNode = {
				type: "element",
				name: tag.name,
				attrs: tag.attrs,
				children: [],
				start: lt,
				end: tag.end,
			};
			container().push(element);
			if (!tag.selfClosing && !VOID_ELEMENTS.has(tag.name)) {
				stack.push(element);
			}
		} else {
			let idx = stack.length - 1;
			while (idx >= 0 && stack[idx]?.name !== tag.name) idx--;
			if (idx >= 0) {
				// Elements opened after the matching one close where this tag starts
				for (let i = stack.length - 1; i > idx; i--) {
					const inner = stack[i];
					if (inner) inner.end = lt;
				}
				const matched = stack[idx];
				if (matched) matched.end = tag.end;
				stack.length = idx;
			}
		}
		pos = tag.end;
		textStart = tag.end;
	}

	flushText(source.length);
	for (const element of stack) {
		element.end = source.length;
	}
	return root;
}

// ---------------------------------------------------------------------------
// Navigation
// ---------------------------------------------------------------------------

/** Every element with the given name, in document order, with its sibling list */
export function locateAll(nodes: MarkupNode[], name: string): NodeLocation[] {
	const found: NodeLocation[] = [];
	const visit = (siblings: MarkupNode[]): void => {
		siblings.forEach((node, index) => {
			if (node.type !== "element") return;
			if (node.name === name) found.push({ element: node, siblings, index });
			visit(node.children);
		});
	};
	visit(nodes);
	return found;
}

export function findAll(nodes: MarkupNode[], name: string): ElementNode[] {
	return locateAll(nodes, name).map((loc) => loc.element);
}

export function findFirst(nodes: MarkupNode[], name: string): ElementNode | undefined {
	return locateAll(nodes, name)[0]?.element;
}

export function isBlankText(node: MarkupNode): boolean {
	return node.type === "text" && node.value.trim() === "";
}

/** The sibling after `index`, skipping whitespace-only text */
export function nextSignificantSibling(
	siblings: MarkupNode[],
	index: number,
): MarkupNode | undefined {
	for (let i = index + 1; i < siblings.length; i++) {
		const node = siblings[i];
		if (node && !isBlankText(node)) return node;
	}
	return undefined;
}

/** All descendant text, concatenated */
export function textContent(node: MarkupNode): string {
	if (node.type === "text") return node.value;
	return node.children.map(textContent).join("");
}

/**
 * The single string inside a node: defined only when the node holds exactly
 * one child, recursing through a lone child element.
 */
export function stringContent(node: MarkupNode): string | undefined {
	if (node.type === "text") return node.value;
	if (node.children.length !== 1) return undefined;
	const [only] = node.children;
	return only ? stringContent(only) : undefined;
}

// ---------------------------------------------------------------------------
// Character references
// ---------------------------------------------------------------------------

const NAMED_REFERENCES: Record<string, string> = {
	amp: "&",
	lt: "<",
	gt: ">",
	quot: '"',
	apos: "'",
	nbsp: "\u00a0",
};

const REFERENCE = /&(#[xX][0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g;

export function decodeEntities(text: string): string {
	if (!text.includes("&")) return text;
	return text.replace(REFERENCE, (raw, body: string) => {
		if (body.startsWith("#")) {
			const hex = body[1] === "x" || body[1] === "X";
			const codePoint = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
			if (!Number.isFinite(codePoint) || codePoint > 0x10ffff) return raw;
			return String.fromCodePoint(codePoint);
		}
		return NAMED_REFERENCES[body.toLowerCase()] ?? raw;
	});
}

export function escapeText(text: string): string {
	return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeAttribute(value: string): string {
	return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;");
}
