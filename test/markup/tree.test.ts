import { describe, expect, test } from "vitest";
import { MarkupSyntaxError } from "../../src/markup/errors.js";
import {
	decodeEntities,
	type ElementNode,
	escapeAttribute,
	escapeText,
	findAll,
	locateAll,
	type MarkupNode,
	nextSignificantSibling,
	parseMarkup,
	stringContent,
	textContent,
} from "../../src/markup/tree.js";

function element(node: MarkupNode | undefined): ElementNode {
	if (node?.type !== "element") throw new Error(`expected element, got ${node?.type}`);
	return node;
}

describe("parseMarkup", () => {
	test("splits text and elements with source offsets", () => {
		const nodes = parseMarkup('a <gadget id="calc">1+1</gadget> b');

		expect(nodes).toHaveLength(3);
		expect(nodes[0]).toEqual({ type: "text", value: "a ", start: 0, end: 2 });
		const gadget = element(nodes[1]);
		expect(gadget.name).toBe("gadget");
		expect(gadget.attrs).toEqual({ id: "calc" });
		expect(gadget.start).toBe(2);
		expect(gadget.end).toBe(32);
		expect(gadget.children).toEqual([{ type: "text", value: "1+1", start: 20, end: 23 }]);
		expect(nodes[2]).toEqual({ type: "text", value: " b", start: 32, end: 34 });
	});

	test("accepts single-quoted, unquoted and bare attributes", () => {
		const [node] = parseMarkup("<GADGET ID='x' flag data=1>in</GADGET>");
		const gadget = element(node);
		expect(gadget.name).toBe("gadget");
		expect(gadget.attrs).toEqual({ id: "x", flag: "", data: "1" });
		expect(textContent(gadget)).toBe("in");
	});

	test("keeps a '<' that does not start a tag as text", () => {
		const nodes = parseMarkup("1 < 2 and 3<4");
		expect(nodes).toEqual([{ type: "text", value: "1 < 2 and 3<4", start: 0, end: 13 }]);
	});

	test("drops stray closing tags", () => {
		const nodes = parseMarkup("a</output>b");
		expect(nodes.map((n) => (n.type === "text" ? n.value : n.name))).toEqual(["a", "b"]);
	});

	test("closes unclosed elements at end of input", () => {
		const source = "<step>x <result>5</result>";
		const [node] = parseMarkup(source);
		const step = element(node);
		expect(step.name).toBe("step");
		expect(step.end).toBe(source.length);
		expect(step.children).toHaveLength(2);
		expect(element(step.children[1]).name).toBe("result");
	});

	test("a closing tag also closes elements opened inside it", () => {
		const nodes = parseMarkup("<a><b>x</a>tail");
		const a = element(nodes[0]);
		const b = element(a.children[0]);
		expect(b.end).toBe(7);
		expect(a.end).toBe(11);
		expect(nodes[1]).toEqual({ type: "text", value: "tail", start: 11, end: 15 });
	});

	test("self-closing and void elements take no children", () => {
		const nodes = parseMarkup("<br>a<x/>b");
		expect(nodes.map((n) => (n.type === "text" ? n.value : n.name))).toEqual([
			"br",
			"a",
			"x",
			"b",
		]);
	});

	test("decodes character references in text", () => {
		const [node] = parseMarkup("<output>3 &lt; 4 &amp;&#65;&#x42;</output>");
		expect(stringContent(element(node))).toBe("3 < 4 &AB");
	});

	test("throws on an attribute value that never ends", () => {
		expect(() => parseMarkup('<gadget id="calc>2+2</gadget>')).toThrow(MarkupSyntaxError);
	});
});

describe("navigation", () => {
	test("locateAll finds nested elements in document order", () => {
		const nodes = parseMarkup("<gadget id='a'>1</gadget><p><gadget id='b'>2</gadget></p>");
		const found = locateAll(nodes, "gadget");
		expect(found.map((loc) => loc.element.attrs.id)).toEqual(["a", "b"]);
		expect(found[0]?.siblings).toBe(nodes);
		expect(found[1]?.index).toBe(0);
		expect(findAll(nodes, "p")).toHaveLength(1);
	});

	test("nextSignificantSibling skips whitespace-only text", () => {
		const nodes = parseMarkup("<gadget>1</gadget>\n  \n<output>2</output>");
		const next = nextSignificantSibling(nodes, 0);
		expect(element(next).name).toBe("output");
		expect(nextSignificantSibling(nodes, 2)).toBeUndefined();
	});

	test("textContent joins descendants while stringContent needs a single child", () => {
		const [gadget] = parseMarkup("<gadget id='a'>1<b>2</b></gadget>");
		expect(textContent(element(gadget))).toBe("12");
		expect(stringContent(element(gadget))).toBeUndefined();

		const [output] = parseMarkup("<output><b>7</b></output>");
		expect(stringContent(element(output))).toBe("7");

		const [empty] = parseMarkup("<result></result>");
		expect(stringContent(element(empty))).toBeUndefined();
	});
});

describe("escaping", () => {
	test("escapeText and decodeEntities are inverse on tag syntax", () => {
		const text = "a < b && c > d";
		expect(escapeText(text)).toBe("a &lt; b &amp;&amp; c &gt; d");
		expect(decodeEntities(escapeText(text))).toBe(text);
	});

	test("escapeAttribute quotes double quotes", () => {
		expect(escapeAttribute('say "hi" & go')).toBe("say &quot;hi&quot; &amp; go");
	});

	test("unknown references are left alone", () => {
		expect(decodeEntities("&bogus; & &#xZZ;")).toBe("&bogus; & &#xZZ;");
	});
});
