export const DEFAULT_OUTPUT_CHAR_LIMIT = 2_000;

/**
 * Character-based truncation with a head/tail split, so a runaway gadget
 * cannot flood the shared token budget.
 */
export function truncateOutput(output: string, maxChars: number): string {
	if (output.length <= maxChars) {
		return output;
	}

	const removed = output.length - maxChars;
	const half = Math.floor(maxChars / 2);
	const head = output.slice(0, half);
	const tail = output.slice(output.length - (maxChars - half));
	return `${head}[... ${removed} characters omitted ...]${tail}`;
}
