export type GenerationEventKind =
	| "generate_start"
	| "round_start"
	| "gadget_call"
	| "row_done"
	| "budget_exhausted"
	| "warning"
	| "generate_end";

export interface GenerationEvent {
	kind: GenerationEventKind;
	timestamp: number;
	/** Batch row the event concerns, when it concerns one */
	row?: number;
	data: Record<string, unknown>;
}

export type EventListener = (event: GenerationEvent) => void;

export class GenerationEventEmitter {
	private listeners: EventListener[] = [];
	private events: GenerationEvent[] = [];

	on(listener: EventListener): () => void {
		this.listeners.push(listener);
		return () => {
			const idx = this.listeners.indexOf(listener);
			if (idx >= 0) this.listeners.splice(idx, 1);
		};
	}

	emit(kind: GenerationEventKind, data: Record<string, unknown> = {}, row?: number): void {
		const event: GenerationEvent = { kind, timestamp: Date.now(), data };
		if (row !== undefined) event.row = row;
		this.events.push(event);
		for (const listener of this.listeners) {
			listener(event);
		}
	}

	collected(): GenerationEvent[] {
		return [...this.events];
	}
}
