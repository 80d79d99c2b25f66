import { createGadgets } from "../gadgets/catalog.js";
import { GadgetController } from "../generation/controller.js";
import { GenerationEventEmitter } from "../generation/events.js";
import { CharTokenizer } from "../generation/tokenizer.js";
import { Client } from "../llm/client.js";
import { ClientStepGenerator } from "../llm/step-generator.js";
import { getResult } from "../markup/result.js";
import { type EvaluationSummary, scorePredictions } from "../metrics/evaluate.js";
import { loadPredictions, type PredictionFields } from "../metrics/predictions.js";
import { loadConfig } from "./config.js";
import { renderEvent } from "./render-event.js";

export { renderEvent } from "./render-event.js";

export type CliCommand =
	| { kind: "run"; prompt: string; configPath?: string; verbose: boolean }
	| {
			kind: "eval";
			file: string;
			fields: PredictionFields;
			useGadgets: boolean;
			confidenceLevel: number;
	  }
	| { kind: "help" };

function optionValue(argv: string[], i: number, name: string): string {
	const value = argv[i];
	if (value === undefined || value.startsWith("--")) {
		throw new Error(`Option ${name} requires a value`);
	}
	return value;
}

function parseRun(argv: string[]): CliCommand {
	let configPath: string | undefined;
	let verbose = false;
	const words: string[] = [];

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";

		if (arg === "--help") return { kind: "help" };

		if (arg === "--config") {
			configPath = optionValue(argv, ++i, arg);
			continue;
		}

		if (arg === "--verbose" || arg === "-v") {
			verbose = true;
			continue;
		}

		words.push(arg);
	}

	const prompt = words.join(" ");
	if (!prompt) return { kind: "help" };

	return { kind: "run", prompt, configPath, verbose };
}

function parseEval(argv: string[]): CliCommand {
	let file: string | undefined;
	const fields: PredictionFields = {};
	let useGadgets = true;
	let confidenceLevel = 0.95;

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";

		switch (arg) {
			case "--help":
				return { kind: "help" };
			case "--prediction-column":
				fields.predictionField = optionValue(argv, ++i, arg);
				break;
			case "--correct-column":
				fields.expectedField = optionValue(argv, ++i, arg);
				break;
			case "--alternative-column":
				fields.alternativeField = optionValue(argv, ++i, arg);
				break;
			case "--no-gadgets":
				useGadgets = false;
				break;
			case "--confidence-level": {
				const raw = optionValue(argv, ++i, arg);
				confidenceLevel = Number(raw);
				if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
					throw new Error(`Confidence level must be between 0 and 1, got ${raw}`);
				}
				break;
			}
			default:
				if (arg.startsWith("--")) {
					throw new Error(`Unknown option ${arg}`);
				}
				if (file !== undefined) {
					throw new Error(`Unexpected argument '${arg}'`);
				}
				file = arg;
		}
	}

	if (file === undefined) return { kind: "help" };
	return { kind: "eval", file, fields, useGadgets, confidenceLevel };
}

/** Parse CLI arguments (process.argv.slice(2)) into a typed command. */
export function parseArgs(argv: string[]): CliCommand {
	const [command, ...rest] = argv;

	if (command === undefined || command === "--help" || command === "help") {
		return { kind: "help" };
	}
	if (command === "run") return parseRun(rest);
	if (command === "eval") return parseEval(rest);

	throw new Error(`Unknown command '${command}'. Run 'gadgetflow --help' for usage.`);
}

export const USAGE = `Usage: gadgetflow <command> [options]

Commands:
  gadgetflow run [options] <prompt>     Answer a prompt, calling gadgets as the model asks
  gadgetflow eval [options] <file>      Score predictions stored as JSON Lines

Run options:
  --config <path>              YAML config (model, provider, gadgets, token budget)
  --verbose, -v                Print generation progress to stderr

Eval options:
  --prediction-column <name>   Field holding the model output (default: prediction)
  --correct-column <name>      Field holding the expected result (default: result)
  --alternative-column <name>  Field holding a second output, for self-consistency
  --no-gadgets                 Read results from plain text instead of gadget markup
  --confidence-level <x>       Bootstrap confidence level (default: 0.95)

  --help                       Show this help message`;

function percent(value: number): string {
	return `${(value * 100).toFixed(1)}%`;
}

/** Human-readable lines for an evaluation summary */
export function formatSummary(summary: EvaluationSummary): string[] {
	const { low, high, confidence_level } = summary.bootstrap;
	const lines = [
		`Evaluated ${summary.count} predictions.`,
		`Predictions have a correct final result in ${percent(summary.correct_results)} of cases.`,
		`${Number((confidence_level * 100).toFixed(2))}% confidence interval: [${percent(low)}, ${percent(high)}]`,
	];
	if (summary.consistency !== undefined) {
		lines.push(
			`Predictions are consistent with the alternative in ${percent(summary.consistency)} of cases.`,
		);
	}
	lines.push(`Average gadget calls per prediction: ${summary.num_gadget_calls_pred.toFixed(2)}`);
	if (summary.num_gadget_calls_true !== undefined) {
		lines.push(`Average gadget calls per reference: ${summary.num_gadget_calls_true.toFixed(2)}`);
	}
	if (summary.correct_num_gadget_calls !== undefined) {
		lines.push(
			`Gadget call count matches the reference in ${percent(summary.correct_num_gadget_calls)} of cases.`,
		);
	}
	if (summary.malformed > 0) {
		lines.push(`Malformed predictions: ${summary.malformed}`);
	}
	return lines;
}

export interface CliIO {
	out(line: string): void;
	err(line: string): void;
	/** Model client for `run` */
	createClient(): Client;
}

const consoleIO: CliIO = {
	out: (line) => console.log(line),
	err: (line) => console.error(line),
	createClient: () => Client.fromEnv(),
};

/** Execute a parsed CLI command. */
export async function runCli(command: CliCommand, io: Partial<CliIO> = {}): Promise<void> {
	const { out, err, createClient } = { ...consoleIO, ...io };

	if (command.kind === "help") {
		out(USAGE);
		return;
	}

	if (command.kind === "eval") {
		const records = await loadPredictions(command.file, command.fields);
		const summary = scorePredictions(records, {
			useGadgets: command.useGadgets,
			confidenceLevel: command.confidenceLevel,
		});
		for (const line of formatSummary(summary)) out(line);
		return;
	}

	// API keys for the providers
	const { config: loadEnv } = await import("dotenv");
	loadEnv();

	const config = await loadConfig(command.configPath);
	const tokenizer = new CharTokenizer();
	const generator = new ClientStepGenerator({
		client: createClient(),
		tokenizer,
		model: config.model,
		provider: config.provider,
		system: config.system_prompt,
		temperature: config.temperature,
	});

	const events = new GenerationEventEmitter();
	events.on((event) => {
		if (!command.verbose && event.kind !== "warning") return;
		const line = renderEvent(event);
		if (line !== null) err(line);
	});

	const controller = new GadgetController({
		generator,
		tokenizer,
		gadgets: createGadgets(config.gadgets),
		defaultMaxTokens: config.max_tokens,
		gadgetOptions: { outputCharLimit: config.output_char_limit },
		events,
	});

	const [row] = await controller.generate([command.prompt]);
	if (!row) return;

	out(row.text);
	out(`Result: ${getResult(row.text)}`);
	if (row.finish_reason === "budget_exhausted") {
		err("Token budget exhausted before the model finished.");
	}
	if (command.verbose) {
		const { input_tokens, output_tokens } = generator.usage;
		err(`Usage: ${input_tokens} input tokens, ${output_tokens} output tokens`);
	}
}
