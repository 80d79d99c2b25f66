import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { DEFAULT_OUTPUT_CHAR_LIMIT } from "../gadgets/truncation.js";
import { DEFAULT_MAX_TOKENS } from "../generation/budget.js";

export interface GadgetflowConfig {
	model: string;
	/** Registered provider name; the client's default when absent */
	provider?: string;
	system_prompt?: string;
	temperature?: number;
	max_tokens: number;
	/** Ids of the gadgets the model may call */
	gadgets: string[];
	output_char_limit: number;
}

export const DEFAULT_SYSTEM_PROMPT = `Solve the problem step by step.
To use a gadget, write <gadget id="ID">INPUT</gadget> and stop; its answer is given back as <output>ANSWER</output>.
The calculator gadget (id "calculator") evaluates arithmetic expressions.
Finish with the final answer inside <result></result>.`;

export const DEFAULT_CONFIG: GadgetflowConfig = {
	model: "claude-3-5-haiku-latest",
	system_prompt: DEFAULT_SYSTEM_PROMPT,
	max_tokens: DEFAULT_MAX_TOKENS,
	gadgets: ["calculator"],
	output_char_limit: DEFAULT_OUTPUT_CHAR_LIMIT,
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(path: string, field: string, expected: string): Error {
	return new Error(`Invalid config at ${path}: '${field}' must be ${expected}`);
}

function readString(raw: Record<string, unknown>, field: string, path: string): string | undefined {
	const value = raw[field];
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "string" || value === "") {
		throw invalid(path, field, "a non-empty string");
	}
	return value;
}

function readNumber(raw: Record<string, unknown>, field: string, path: string): number | undefined {
	const value = raw[field];
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw invalid(path, field, "a number");
	}
	return value;
}

function readCount(
	raw: Record<string, unknown>,
	field: string,
	path: string,
	min: number,
): number | undefined {
	const value = raw[field];
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
		throw invalid(path, field, `an integer of at least ${min}`);
	}
	return value;
}

function readStringList(
	raw: Record<string, unknown>,
	field: string,
	path: string,
): string[] | undefined {
	const value = raw[field];
	if (value === undefined || value === null) return undefined;
	if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
		throw invalid(path, field, "a list of strings");
	}
	return value.map(String);
}

/** Validate parsed YAML and merge it over the defaults */
export function parseConfig(content: string, path: string): GadgetflowConfig {
	const raw: unknown = parse(content);
	if (raw === null || raw === undefined) {
		return { ...DEFAULT_CONFIG, gadgets: [...DEFAULT_CONFIG.gadgets] };
	}
	if (!isRecord(raw)) {
		throw new Error(`Invalid config at ${path}: expected a mapping of settings`);
	}

	const config: GadgetflowConfig = { ...DEFAULT_CONFIG, gadgets: [...DEFAULT_CONFIG.gadgets] };

	const model = readString(raw, "model", path);
	if (model !== undefined) config.model = model;

	const provider = readString(raw, "provider", path);
	if (provider !== undefined) config.provider = provider;

	const systemPrompt = readString(raw, "system_prompt", path);
	if (systemPrompt !== undefined) config.system_prompt = systemPrompt;

	const temperature = readNumber(raw, "temperature", path);
	if (temperature !== undefined) config.temperature = temperature;

	const maxTokens = readCount(raw, "max_tokens", path, 1);
	if (maxTokens !== undefined) config.max_tokens = maxTokens;

	// Hosted completion APIs take no minimum length
	if (raw.min_tokens !== undefined) {
		throw new Error(`Invalid config at ${path}: 'min_tokens' is not supported by hosted models`);
	}

	const gadgets = readStringList(raw, "gadgets", path);
	if (gadgets !== undefined) config.gadgets = gadgets;

	const outputCharLimit = readCount(raw, "output_char_limit", path, 1);
	if (outputCharLimit !== undefined) config.output_char_limit = outputCharLimit;

	return config;
}

/** Load a YAML config file; without a path the defaults apply */
export async function loadConfig(path?: string): Promise<GadgetflowConfig> {
	if (!path) {
		return { ...DEFAULT_CONFIG, gadgets: [...DEFAULT_CONFIG.gadgets] };
	}
	const content = await readFile(path, "utf-8");
	return parseConfig(content, path);
}
