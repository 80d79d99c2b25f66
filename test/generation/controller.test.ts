import { describe, expect, test } from "vitest";
import { Calculator } from "../../src/gadgets/calculator.js";
import type { Gadget } from "../../src/gadgets/types.js";
import { GadgetController } from "../../src/generation/controller.js";
import { CharTokenizer } from "../../src/generation/tokenizer.js";
import { RowState, type StepGenerator } from "../../src/generation/types.js";
import { ProtocolInputError } from "../../src/markup/errors.js";
import { Steps } from "../../src/markup/types.js";
import { type ScriptChunk, ScriptedGenerator } from "./fixtures.js";

const tokenizer = new CharTokenizer();

class EchoGadget implements Gadget {
	readonly inputs: string[] = [];

	identify(): string {
		return "echo";
	}

	invoke(input: string): string {
		this.inputs.push(input);
		return `seen:${input}`;
	}
}

function setup(scripts: Record<string, ScriptChunk[]>, gadgets: Gadget[] = [new Calculator()]) {
	const generator = new ScriptedGenerator(tokenizer, scripts);
	const controller = new GadgetController({ generator, tokenizer, gadgets });
	return { generator, controller };
}

describe("GadgetController", () => {
	test("a row without gadget calls finishes at end of sequence", async () => {
		const { generator, controller } = setup({ q: ["Final answer is <result>129818</result>."] });

		const [row] = await controller.generate(["q"]);

		expect(row).toEqual({
			text: "Final answer is <result>129818</result>.",
			state: RowState.DONE,
			finish_reason: "end_of_sequence",
		});
		expect(generator.requests).toHaveLength(1);
	});

	test("splices the gadget output after the call and resumes the row", async () => {
		const { generator, controller } = setup({
			q: ['Compute. <gadget id="calculator">2+2</gadget>', " So <result>4</result>"],
		});

		const [row] = await controller.generate(["q"]);

		const afterCall = 'Compute. <gadget id="calculator">2+2</gadget>\n<output>4</output>\n';
		expect(row?.text).toBe(`${afterCall} So <result>4</result>`);
		expect(row?.finish_reason).toBe("end_of_sequence");
		expect(generator.requests).toHaveLength(2);
		expect(tokenizer.decode(generator.requests[1]?.seeds[0] ?? [])).toBe(afterCall);
	});

	test("generateDecoded returns the chain and result of each row", async () => {
		const { controller } = setup({
			q: ['Compute. <gadget id="calculator">2+2</gadget>', " So <result>4</result>"],
		});

		const [row] = await controller.generateDecoded(["q"]);

		expect(row?.chain).toEqual([
			Steps.text("Compute."),
			Steps.interaction("calculator", "2+2", "4"),
			Steps.text("So"),
		]);
		expect(row?.result).toBe("4");
	});

	test("generateDecoded reports a malformed row without losing the others", async () => {
		const { controller } = setup({
			good: ['<gadget id="calculator">2+2</gadget>', "<result>4</result>"],
			bad: ['<gadget id="calc>2+2</gadget>'],
		});

		const [good, bad] = await controller.generateDecoded(["good", "bad"]);

		expect(good?.result).toBe("4");
		expect(good?.error).toBeUndefined();
		expect(bad).toEqual({
			text: '<gadget id="calc>2+2</gadget>',
			state: RowState.DONE,
			finish_reason: "end_of_sequence",
			chain: [],
			result: "",
			error: "Unterminated value for attribute 'id' in <gadget> at offset 0",
		});
	});

	test("resolves several calls closed in one round", async () => {
		const { controller } = setup({
			q: [
				'<gadget id="calculator">2+2</gadget><gadget id="calculator">3*3</gadget>',
				"<result>9</result>",
			],
		});

		const [row] = await controller.generate(["q"]);

		expect(row?.text).toBe(
			'<gadget id="calculator">2+2</gadget>\n<output>4</output>\n' +
				'<gadget id="calculator">3*3</gadget>\n<output>9</output>\n' +
				"<result>9</result>",
		);
	});

	test("calls that already have an output are not invoked again", async () => {
		const echo = new EchoGadget();
		const { controller } = setup(
			{ q: ['<gadget id="echo">a</gadget>', ' then <gadget id="echo">b</gadget>', " end"] },
			[echo],
		);

		const [row] = await controller.generate(["q"]);

		expect(echo.inputs).toEqual(["a", "b"]);
		expect(row?.text).toBe(
			'<gadget id="echo">a</gadget>\n<output>seen:a</output>\n' +
				' then <gadget id="echo">b</gadget>\n<output>seen:b</output>\n end',
		);
	});

	test("an unknown gadget id yields an error output and the row keeps going", async () => {
		const { controller } = setup({ q: ['<gadget id="y">1+1</gadget>', "Stuck."] });

		const [row] = await controller.generate(["q"]);

		expect(row?.text).toBe(
			"<gadget id=\"y\">1+1</gadget>\n<output>ERROR: Gadget 'y' not found</output>\nStuck.",
		);
		expect(row?.finish_reason).toBe("end_of_sequence");
	});

	test("the longest row ends generation for the whole batch", async () => {
		const { generator, controller } = setup({
			long: [{ text: "a".repeat(18), eos: false }],
			short: [{ text: "b", eos: false }],
		});

		const rows = await controller.generate(["long", "short"], { maxNewTokens: 20 });

		expect(rows).toEqual([
			{ text: "a".repeat(18), state: RowState.DONE, finish_reason: "budget_exhausted" },
			{ text: "b", state: RowState.DONE, finish_reason: "budget_exhausted" },
		]);
		expect(generator.requests).toHaveLength(1);
		expect(generator.requests[0]?.maxNewTokens).toBe(20);
		const exhausted = controller.events.collected().find((e) => e.kind === "budget_exhausted");
		expect(exhausted?.data).toEqual({ round: 1, longest: 18, max_tokens: 20, running: 2 });
	});

	test("a budget within the safety margin generates nothing", async () => {
		const { generator, controller } = setup({ q: ["never"] });

		const rows = await controller.generate(["q"], { maxNewTokens: 2 });

		expect(rows).toEqual([{ text: "", state: RowState.DONE, finish_reason: "budget_exhausted" }]);
		expect(generator.requests).toHaveLength(0);
	});

	test("finished rows leave the batch while the others continue", async () => {
		const { generator, controller } = setup({
			a: ["done"],
			b: ['<gadget id="calculator">1+1</gadget>', "two"],
		});

		const rows = await controller.generate(["a", "b"]);

		expect(rows.map((r) => r.text)).toEqual([
			"done",
			'<gadget id="calculator">1+1</gadget>\n<output>2</output>\ntwo',
		]);
		expect(generator.requests.map((r) => r.prompts)).toEqual([["a", "b"], ["b"]]);
	});

	test("unparseable text raises a warning and the row keeps generating", async () => {
		const { controller } = setup({ w: ['<gadget id="calc>2+2</gadget>', "done"] });

		const [row] = await controller.generate(["w"]);

		expect(row?.text).toBe('<gadget id="calc>2+2</gadget>done');
		const warnings = controller.events.collected().filter((e) => e.kind === "warning");
		expect(warnings).toHaveLength(1);
		expect(warnings[0]?.row).toBe(0);
	});

	test("converts absolute lengths using the longest prompt", async () => {
		const { generator, controller } = setup({ abcde: ["x"] });

		await controller.generate(["abcde"], { maxLength: 50, minLength: 10 });

		expect(generator.requests[0]?.maxNewTokens).toBe(45);
		expect(generator.requests[0]?.minNewTokens).toBe(5);
	});

	test("omits the minimum when none is requested", async () => {
		const { generator, controller } = setup({ q: ["x"] });

		await controller.generate(["q"]);

		expect(generator.requests[0]?.minNewTokens).toBeUndefined();
		expect(generator.requests[0]?.maxNewTokens).toBe(1000);
	});

	test("an empty batch returns immediately", async () => {
		const { generator, controller } = setup({});
		expect(await controller.generate([])).toEqual([]);
		expect(generator.requests).toHaveLength(0);
	});

	test("rejects a generator that drops rows", async () => {
		const generator: StepGenerator = { generateStep: async () => [] };
		const controller = new GadgetController({ generator, tokenizer, gadgets: [] });

		await expect(controller.generate(["q"])).rejects.toThrow(
			"Generator returned 0 sequences for 1 running rows",
		);
	});

	test("truncates long gadget outputs with the configured limit", async () => {
		const generator = new ScriptedGenerator(tokenizer, {
			q: ['<gadget id="echo">abcdefghijklmnop</gadget>', "end"],
		});
		const controller = new GadgetController({
			generator,
			tokenizer,
			gadgets: [new EchoGadget()],
			gadgetOptions: { outputCharLimit: 10 },
		});

		const [row] = await controller.generate(["q"]);

		expect(row?.text).toBe(
			'<gadget id="echo">abcdefghijklmnop</gadget>\n' +
				"<output>seen:[... 11 characters omitted ...]lmnop</output>\nend",
		);
	});

	test("rejects gadgets that share an id", async () => {
		const { controller } = setup({ q: ["x"] }, [new Calculator(), new Calculator()]);

		await expect(controller.generate(["q"])).rejects.toThrow(ProtocolInputError);
	});

	test("emits lifecycle events in order", async () => {
		const { controller } = setup({ q: ['<gadget id="calculator">2+2</gadget>', "ok"] });

		await controller.generate(["q"]);

		const events = controller.events.collected();
		expect(events.map((e) => e.kind)).toEqual([
			"generate_start",
			"round_start",
			"gadget_call",
			"round_start",
			"row_done",
			"generate_end",
		]);
		expect(events[2]?.row).toBe(0);
		expect(events[2]?.data).toEqual({ gadget_id: "calculator", input: "2+2", output: "4" });
		expect(events[5]?.data).toEqual({ rounds: 2, finish_reasons: ["end_of_sequence"] });
	});
});
