export * from "./core/types.js";
export * from "./core/interfaces.js";
export * from "./core/errors.js";
export * from "./core/config.js";
export * from "./core/signatures.js";
export * from "./core/stepAccessors.js";
export * from "./core/trajectoryLoader.js";
export * from "./core/classifiers.js";
export * from "./core/auditLog.js";
export * from "./core/analyzer.js";

export * from "./backends/local/index.js";

export * from "./report/sweep.js";
export * from "./report/spotcheck.js";
