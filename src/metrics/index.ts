export type { BootstrapOptions, ConfidenceInterval } from "./bootstrap.js";
export { bootstrapMean, mean, seededRandom } from "./bootstrap.js";
export type {
	EvaluationSummary,
	PredictionRecord,
	PredictionScore,
	ScoreOptions,
} from "./evaluate.js";
export { scorePrediction, scorePredictions } from "./evaluate.js";
export type { Tolerance } from "./numeric.js";
export {
	areNumericResultsSame,
	isClose,
	normalizeNumericText,
	parseNumericResult,
} from "./numeric.js";
export type { PredictionFields } from "./predictions.js";
export { loadPredictions, parsePredictions } from "./predictions.js";
