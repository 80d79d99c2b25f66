import { fromModelMarkup } from "../markup/codec.js";
import { ProtocolError } from "../markup/errors.js";
import { getResult } from "../markup/result.js";
import { type Chain, countInteractions, RESULT_TAG } from "../markup/types.js";
import { type BootstrapOptions, bootstrapMean, type ConfidenceInterval, mean } from "./bootstrap.js";
import { areNumericResultsSame, type Tolerance } from "./numeric.js";

export interface PredictionRecord {
	/** Raw model output */
	prediction: string;
	/** Bare expected result, or a full reference chain in markup */
	expected: string;
	/** A second output for the same input, used to measure self-consistency */
	alternative?: string;
}

export interface ScoreOptions {
	/** Decode predictions as gadget markup; otherwise extract the result from plain text */
	useGadgets?: boolean;
	tolerance?: Tolerance;
}

export interface PredictionScore {
	predicted_result: string;
	expected_result: string;
	correct: boolean;
	consistent?: boolean;
	num_gadget_calls_pred: number;
	num_gadget_calls_true?: number;
	/** The prediction violated the markup protocol and was scored as no answer */
	malformed: boolean;
}

export interface EvaluationSummary {
	count: number;
	correct_results: number;
	consistency?: number;
	num_gadget_calls_pred: number;
	num_gadget_calls_true?: number;
	correct_num_gadget_calls?: number;
	malformed: number;
	bootstrap: ConfidenceInterval;
}

interface Extracted {
	chain: Chain;
	result: string;
	malformed: boolean;
}

function decodeLeniently(markup: string): Extracted {
	try {
		return { ...fromModelMarkup(markup), malformed: false };
	} catch (err) {
		if (err instanceof ProtocolError) {
			return { chain: [], result: "", malformed: true };
		}
		throw err;
	}
}

// An unclosed <step> would swallow the rest of the output, result included
const STEP_TAG = /<step>/g;

function extract(output: string, useGadgets: boolean): Extracted {
	if (useGadgets) return decodeLeniently(output.replace(STEP_TAG, "[step]"));
	return { chain: [], result: getResult(output), malformed: false };
}

const RESULT_TAG_PATTERN = new RegExp(`<${RESULT_TAG}[\\s>]`, "i");

export function scorePrediction(
	record: PredictionRecord,
	options: ScoreOptions = {},
): PredictionScore {
	const useGadgets = options.useGadgets ?? true;
	const predicted = extract(record.prediction, useGadgets);

	let expectedResult = record.expected.trim();
	let expectedCalls: number | undefined;
	if (RESULT_TAG_PATTERN.test(record.expected)) {
		const reference = decodeLeniently(record.expected);
		expectedResult = reference.result;
		expectedCalls = countInteractions(reference.chain);
	}

	const score: PredictionScore = {
		predicted_result: predicted.result,
		expected_result: expectedResult,
		correct: areNumericResultsSame(predicted.result, expectedResult, options.tolerance),
		num_gadget_calls_pred: countInteractions(predicted.chain),
		malformed: predicted.malformed,
	};
	if (expectedCalls !== undefined) {
		score.num_gadget_calls_true = expectedCalls;
	}
	if (record.alternative !== undefined) {
		score.consistent = extract(record.alternative, useGadgets).result === predicted.result;
	}
	return score;
}

export function scorePredictions(
	records: readonly PredictionRecord[],
	options: ScoreOptions & BootstrapOptions = {},
): EvaluationSummary {
	if (records.length === 0) {
		throw new Error("No predictions to score");
	}

	const scores = records.map((record) => scorePrediction(record, options));
	const correct = scores.map((s) => (s.correct ? 1 : 0));

	const summary: EvaluationSummary = {
		count: scores.length,
		correct_results: mean(correct),
		num_gadget_calls_pred: mean(scores.map((s) => s.num_gadget_calls_pred)),
		malformed: scores.filter((s) => s.malformed).length,
		bootstrap: bootstrapMean(correct, options),
	};

	const consistency = scores.flatMap((s) =>
		s.consistent === undefined ? [] : [s.consistent ? 1 : 0],
	);
	if (consistency.length > 0) {
		summary.consistency = mean(consistency);
	}

	const withReference = scores.flatMap((s) =>
		s.num_gadget_calls_true === undefined
			? []
			: [{ pred: s.num_gadget_calls_pred, truth: s.num_gadget_calls_true }],
	);
	if (withReference.length > 0) {
		summary.num_gadget_calls_true = mean(withReference.map((r) => r.truth));
		summary.correct_num_gadget_calls = mean(
			withReference.map((r) => (r.pred === r.truth ? 1 : 0)),
		);
	}

	return summary;
}
