import { readFile } from "node:fs/promises";
import type { PredictionRecord } from "./evaluate.js";

export interface PredictionFields {
	predictionField?: string;
	expectedField?: string;
	/** Optional column holding a second sample for self-consistency */
	alternativeField?: string;
}

function fieldText(row: Record<string, unknown>, field: string): string | undefined {
	const value = row[field];
	if (typeof value === "string") return value;
	if (typeof value === "number" && Number.isFinite(value)) return String(value);
	return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse JSON Lines into prediction records. Blank lines are skipped. */
export function parsePredictions(content: string, fields: PredictionFields = {}): PredictionRecord[] {
	const predictionField = fields.predictionField ?? "prediction";
	const expectedField = fields.expectedField ?? "result";
	const records: PredictionRecord[] = [];

	content.split("\n").forEach((line, idx) => {
		if (line.trim() === "") return;
		const lineNo = idx + 1;

		let row: unknown;
		try {
			row = JSON.parse(line);
		} catch (err) {
			throw new Error(`Line ${lineNo}: invalid JSON (${String(err)})`);
		}
		if (!isRecord(row)) {
			throw new Error(`Line ${lineNo}: expected a JSON object`);
		}

		const prediction = fieldText(row, predictionField);
		const expected = fieldText(row, expectedField);
		if (prediction === undefined) {
			throw new Error(`Line ${lineNo}: missing or invalid '${predictionField}'`);
		}
		if (expected === undefined) {
			throw new Error(`Line ${lineNo}: missing or invalid '${expectedField}'`);
		}

		const record: PredictionRecord = { prediction, expected };
		if (fields.alternativeField) {
			const alternative = fieldText(row, fields.alternativeField);
			if (alternative !== undefined) record.alternative = alternative;
		}
		records.push(record);
	});

	return records;
}

export async function loadPredictions(
	path: string,
	fields: PredictionFields = {},
): Promise<PredictionRecord[]> {
	const content = await readFile(path, "utf-8");
	return parsePredictions(content, fields);
}
