import { describe, expect, test } from "vitest";
import { type GenerationEvent, GenerationEventEmitter } from "../../src/generation/events.js";

describe("GenerationEventEmitter", () => {
	test("delivers events to listeners until they unsubscribe", () => {
		const emitter = new GenerationEventEmitter();
		const seen: GenerationEvent[] = [];
		const off = emitter.on((event) => seen.push(event));

		emitter.emit("round_start", { round: 1 });
		off();
		emitter.emit("round_start", { round: 2 });

		expect(seen.map((e) => e.data)).toEqual([{ round: 1 }]);
		expect(emitter.collected()).toHaveLength(2);
	});

	test("records the row only when one is given", () => {
		const emitter = new GenerationEventEmitter();
		emitter.emit("generate_start");
		emitter.emit("warning", { message: "x" }, 3);

		const [start, warning] = emitter.collected();
		expect(start).not.toHaveProperty("row");
		expect(warning?.row).toBe(3);
	});
});
