export * from "./editDistance/costs.js";
export * from "./editDistance/operations.js";
export * from "./editDistance/engine.js";
export * from "./editDistance/distance.js";
export * from "./editDistance/render.js";
export * from "./text/tokenizer.js";
export * from "./vocabulary/vocabulary.js";
export * from "./vocabulary/loader.js";
export * from "./spelling/candidateIndex.js";
export * from "./spelling/scoring.js";
export * from "./spelling/corrector.js";
export * from "./config/settings.js";
export * from "./errors.js";
export * from "./logger.js";
