import type { GenerationEvent } from "../generation/events.js";

/** Collapse whitespace and cut to maxLen, adding an ellipsis if cut */
function inline(value: unknown, maxLen: number): string {
	const str = String(value).replace(/\s+/g, " ").trim();
	if (str.length <= maxLen) return str;
	return `${str.slice(0, maxLen - 3)}...`;
}

/**
 * Render a GenerationEvent as a terminal-friendly plain string.
 * Returns null for events that shouldn't be shown.
 */
export function renderEvent(event: GenerationEvent): string | null {
	const { kind, row, data } = event;
	const prefix = row === undefined ? "" : `[row ${row}] `;

	switch (kind) {
		case "generate_start": {
			const rows = data.rows === 1 ? "1 row" : `${data.rows} rows`;
			return `◆ Generating ${rows}, budget ${data.max_tokens} tokens`;
		}

		case "round_start":
			return `◌ round ${data.round}: ${data.running} running, longest ${data.longest} tokens`;

		case "gadget_call":
			return `${prefix}▸ ${data.gadget_id} ${inline(data.input, 60)} → ${inline(data.output, 60)}`;

		case "row_done":
			return `${prefix}✓ finished`;

		case "budget_exhausted":
			return `⊘ Token budget exhausted: longest row ${data.longest} of ${data.max_tokens} tokens`;

		case "warning":
			return `${prefix}⚠ ${data.message}`;

		case "generate_end": {
			const rounds = data.rounds === 1 ? "1 round" : `${data.rounds} rounds`;
			return `◇ Done. ${rounds}.`;
		}

		default:
			return null;
	}
}
