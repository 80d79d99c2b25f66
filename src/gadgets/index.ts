export { Calculator } from "./calculator.js";
export { builtinGadgetIds, createGadgets } from "./catalog.js";
export type { GadgetRegistryOptions } from "./registry.js";
export { createGadgetRegistry, gadgetFailure, gadgetNotFound } from "./registry.js";
export { DEFAULT_OUTPUT_CHAR_LIMIT, truncateOutput } from "./truncation.js";
export type { Gadget, GadgetRegistry } from "./types.js";
