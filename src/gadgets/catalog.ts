import { Calculator } from "./calculator.js";
import type { Gadget } from "./types.js";

const BUILTIN_GADGETS: Record<string, () => Gadget> = {
	[Calculator.ID]: () => new Calculator(),
};

export function builtinGadgetIds(): string[] {
	return Object.keys(BUILTIN_GADGETS);
}

/** Instantiate built-in gadgets by id, e.g. from a config file */
export function createGadgets(ids: readonly string[]): Gadget[] {
	return ids.map((id) => {
		const factory = BUILTIN_GADGETS[id];
		if (!factory) {
			throw new Error(
				`Unknown gadget '${id}'. Available gadgets: ${builtinGadgetIds().join(", ")}`,
			);
		}
		return factory();
	});
}
