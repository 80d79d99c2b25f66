// gadgetflow: generation that stops for gadget calls and resumes with their output
export const VERSION = "0.1.0";

export * from "./gadgets/index.js";
export * from "./generation/index.js";
export * from "./llm/index.js";
export * from "./markup/index.js";
export * from "./metrics/index.js";
export type { GadgetflowConfig } from "./host/config.js";
export { DEFAULT_CONFIG, loadConfig, parseConfig } from "./host/config.js";
