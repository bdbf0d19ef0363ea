import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { TrajectoryAnalyzer } from "../core/analyzer.js";
import { formatClassificationResult } from "../core/classifiers.js";
import { errorMessage } from "../core/errors.js";
import { loadTrajectory } from "../core/trajectoryLoader.js";
import type { InstanceLocation, StepIndexList, ToolUsageCounts } from "../core/types.js";

const SEARCH_SHARE_WARNING_THRESHOLD = 0.8;

export interface InstanceReport {
  summary: string;
  warnings: string[];
}

export interface SweepOptions {
  reportPath?: string;
  emit?: (line: string) => void;
}

export function formatSummaryLine(
  location: Pick<InstanceLocation, "instanceId" | "label">,
  reproductionSteps: StepIndexList,
  searchSteps: StepIndexList,
  toolCounts: ToolUsageCounts,
): string {
  return (
    `${location.instanceId} (${location.label}) -> ` +
    `repro_steps=${reproductionSteps.length}, ` +
    `search_steps=${searchSteps.length}, ` +
    `tools=${formatClassificationResult(toolCounts)}`
  );
}

export function collectWarnings(
  reproductionSteps: StepIndexList,
  searchSteps: StepIndexList,
  toolCounts: ToolUsageCounts,
  totalSteps: number,
): string[] {
  const warnings: string[] = [];
  if (toolCounts.size === 0) {
    warnings.push("WARNING: zero tool calls reported");
  }

  if (totalSteps > 0) {
    if (searchSteps.length / totalSteps > SEARCH_SHARE_WARNING_THRESHOLD) {
      warnings.push(`WARNING: search steps high (${searchSteps.length}/${totalSteps})`);
    }

    const outOfRange = reproductionSteps.filter((index) => index < 1 || index > totalSteps);
    if (outOfRange.length > 0) {
      warnings.push(
        `WARNING: reproduction indices out of range for ${totalSteps} steps (${JSON.stringify(outOfRange)})`,
      );
    }
  }

  return warnings;
}

/** Runs all three classifiers. A failing instance becomes an ERROR summary. */
export function analyzeInstance(
  analyzer: TrajectoryAnalyzer,
  location: InstanceLocation,
): InstanceReport {
  try {
    const steps = loadTrajectory(location.trajectoryPath);
    const reproductionSteps = analyzer.locateReproductionCode(location.instanceId);
    const searchSteps = analyzer.locateSearch(location.instanceId);
    const toolCounts = analyzer.locateToolUse(location.instanceId);

    return {
      summary: formatSummaryLine(location, reproductionSteps, searchSteps, toolCounts),
      warnings: collectWarnings(reproductionSteps, searchSteps, toolCounts, steps.length),
    };
  } catch (error) {
    return {
      summary: `${location.instanceId} (${location.label}) -> ERROR: ${errorMessage(error)}`,
      warnings: [],
    };
  }
}

export function runSweep(analyzer: TrajectoryAnalyzer, options: SweepOptions = {}): string[] {
  const lines: string[] = [];
  const emit = (line: string): void => {
    lines.push(line);
    options.emit?.(line);
  };

  for (const location of analyzer.listInstances()) {
    const report = analyzeInstance(analyzer, location);
    emit(report.summary);
    for (const warning of report.warnings) {
      emit(`  ${warning}`);
    }
  }

  if (options.reportPath && lines.length > 0) {
    mkdirSync(dirname(options.reportPath), { recursive: true });
    writeFileSync(options.reportPath, `${lines.join("\n")}\n`, "utf-8");
  }

  return lines;
}
