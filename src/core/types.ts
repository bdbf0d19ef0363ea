/**
 * One recorded agent action. Producers disagree on field names, so a step is
 * kept as an open mapping and read through the accessors in `stepAccessors.ts`.
 */
export type TrajectoryStep = Record<string, unknown>;

/** Ordered steps of one run. Reported indices are 1-based. */
export type Trajectory = TrajectoryStep[];

export type StepIndexList = number[];

/**
 * Tool name -> invocation count, keys in lexicographic order. A Map keeps that
 * order for integer-like names, which a plain object would move to the front.
 */
export type ToolUsageCounts = Map<string, number>;

export type ClassificationResult = StepIndexList | ToolUsageCounts;

export type ClassifierKind = "reproduction" | "search" | "toolUse";

export interface SearchRoot {
  label: string;
  dir: string;
}

export interface InstanceLocation {
  instanceId: string;
  label: string;
  instanceDir: string;
  trajectoryPath: string;
}

export interface AnalyzerLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
