export * from "./types";
export * from "./errors";
export * from "./sequence";
export * from "./counter";
export * from "./estimator";
export * from "./sampler";
export * from "./random";
export * from "./dump";
export { LanguageModel } from "./model";
