import { evaluate, format } from "mathjs";
import { gadgetFailure } from "./registry.js";
import type { Gadget } from "./types.js";

// Thousands separators: a comma between a digit and exactly three more digits
const THOUSANDS_SEPARATOR = /(\d),(?=\d{3}(?!\d))/g;

/** Arithmetic over mathjs expressions, e.g. `2 * (3 + 4)` or `sqrt(16)` */
export class Calculator implements Gadget {
	static readonly ID = "calculator";

	identify(): string {
		return Calculator.ID;
	}

	invoke(input: string): string {
		const expression = input.trim().replace(THOUSANDS_SEPARATOR, "$1");
		if (!expression) {
			return "ERROR: empty expression";
		}
		try {
			const value: unknown = evaluate(expression);
			return format(value, { precision: 14 });
		} catch (err) {
			return gadgetFailure(err);
		}
	}
}
