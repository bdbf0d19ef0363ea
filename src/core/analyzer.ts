import {
  classifyReproductionSteps,
  classifySearchSteps,
  countToolUse,
} from "./classifiers.js";
import type { AuditSink, InstanceResolver } from "./interfaces.js";
import { loadTrajectory } from "./trajectoryLoader.js";
import type {
  ClassificationResult,
  ClassifierKind,
  InstanceLocation,
  StepIndexList,
  ToolUsageCounts,
  Trajectory,
} from "./types.js";

export interface TrajectoryAnalyzerOptions {
  resolver: InstanceResolver;
  audit: AuditSink;
}

/**
 * Instance id -> trajectory -> classification. Every call re-reads the
 * trajectory file; nothing is cached between calls.
 */
export class TrajectoryAnalyzer {
  private readonly resolver: InstanceResolver;
  private readonly audit: AuditSink;

  constructor(options: TrajectoryAnalyzerOptions) {
    this.resolver = options.resolver;
    this.audit = options.audit;
  }

  locate(instanceId: string): InstanceLocation {
    return this.resolver.locate(instanceId);
  }

  listInstances(): InstanceLocation[] {
    return this.resolver.list();
  }

  loadSteps(instanceId: string): Trajectory {
    return loadTrajectory(this.resolver.locate(instanceId).trajectoryPath);
  }

  /** 1-based indices of steps that write reproduction or test code. */
  locateReproductionCode(instanceId: string): StepIndexList {
    const matches = classifyReproductionSteps(this.loadSteps(instanceId));
    this.audit.record("reproduction", instanceId, matches);
    return matches;
  }

  /** 1-based indices of navigation and search steps. */
  locateSearch(instanceId: string): StepIndexList {
    const matches = classifySearchSteps(this.loadSteps(instanceId));
    this.audit.record("search", instanceId, matches);
    return matches;
  }

  locateToolUse(instanceId: string): ToolUsageCounts {
    const counts = countToolUse(this.loadSteps(instanceId));
    this.audit.record("toolUse", instanceId, counts);
    return counts;
  }

  analyze(kind: ClassifierKind, instanceId: string): ClassificationResult {
    switch (kind) {
      case "reproduction":
        return this.locateReproductionCode(instanceId);
      case "search":
        return this.locateSearch(instanceId);
      case "toolUse":
        return this.locateToolUse(instanceId);
    }
  }
}
