export * from "./types";
export * from "./feature";
export * from "./env";
export * from "./errors";
export { expToCheck, expToInvariant } from "./parse";
export { translate, type Translation } from "./translate";
export * from "./model";
export { runInvariantAnalysis, runPropertyAnalysis, type Analysis, type AnalysisResult } from "./eval";
export { renderFeatureDocs } from "./docs";
