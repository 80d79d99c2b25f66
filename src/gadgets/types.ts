/**
 * A named, callable tool.
 * `invoke` must not throw for malformed input: failures come back as text
 * so the markup stream stays well formed.
 */
export interface Gadget {
	/** Stable identifier, used as the gadget tag's `id` and as the registry key */
	identify(): string;
	invoke(input: string): string | Promise<string>;
}

/** Read-only lookup built once per generation call */
export interface GadgetRegistry {
	ids(): string[];
	get(id: string): Gadget | undefined;
	/** Never throws: unknown ids and gadget failures come back as `ERROR:` text */
	invoke(id: string, input: string): Promise<string>;
}
