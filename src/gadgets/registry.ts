import { ProtocolInputError } from "../markup/errors.js";
import { DEFAULT_OUTPUT_CHAR_LIMIT, truncateOutput } from "./truncation.js";
import type { Gadget, GadgetRegistry } from "./types.js";

export interface GadgetRegistryOptions {
	/** Longest gadget output spliced back into the text */
	outputCharLimit?: number;
}

export function gadgetNotFound(id: string): string {
	return `ERROR: Gadget '${id}' not found`;
}

export function gadgetFailure(err: unknown): string {
	return `ERROR: ${err instanceof Error ? err.message : String(err)}`;
}

export function createGadgetRegistry(
	gadgets: readonly Gadget[],
	options: GadgetRegistryOptions = {},
): GadgetRegistry {
	const byId = new Map<string, Gadget>();

	for (const gadget of gadgets) {
		const id = gadget.identify();
		if (byId.has(id)) {
			throw new ProtocolInputError(`Duplicate gadget id: '${id}'`, { id });
		}
		byId.set(id, gadget);
	}

	const outputCharLimit = options.outputCharLimit ?? DEFAULT_OUTPUT_CHAR_LIMIT;

	return {
		ids: () => [...byId.keys()],
		get: (id) => byId.get(id),
		invoke: async (id, input) => {
			const gadget = byId.get(id);
			if (!gadget) {
				return gadgetNotFound(id);
			}
			let output: string;
			try {
				output = await gadget.invoke(input);
			} catch (err) {
				// No retries: the failure becomes the gadget's answer
				output = gadgetFailure(err);
			}
			return truncateOutput(output, outputCharLimit);
		},
	};
}
