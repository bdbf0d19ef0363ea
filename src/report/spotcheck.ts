import type { TrajectoryAnalyzer } from "../core/analyzer.js";
import { formatClassificationResult } from "../core/classifiers.js";
import { clipText, extractFilenames } from "../core/signatures.js";
import { commandTextOf, isPresent, thoughtOf, toText, toolNameOf } from "../core/stepAccessors.js";
import type { StepIndexList, Trajectory } from "../core/types.js";

const THOUGHT_PREVIEW_LIMIT = 200;
const UNKNOWN_TOOL = "(unknown)";

export function formatStepDetails(steps: Trajectory, index: number, indent = "  "): string[] {
  const step = index >= 1 ? steps[index - 1] : undefined;
  if (!step) {
    return [`${indent}Step ${index} is out of range for ${steps.length} steps`];
  }

  const thought = clipText(thoughtOf(step), THOUGHT_PREVIEW_LIMIT);
  const tool = toolNameOf(step) || UNKNOWN_TOOL;
  const command = commandTextOf(step);
  const files = extractFilenames(isPresent(step.action) ? toText(step.action) : command);

  const lines = [`${indent}Step ${index}:`];
  if (thought) {
    lines.push(`${indent}  Thought: ${thought}`);
  }
  lines.push(`${indent}  Tool: ${tool}`);
  if (command) {
    lines.push(`${indent}  Command: ${command}`);
  }
  if (files.length > 0) {
    lines.push(`${indent}  Files: ${files.join(", ")}`);
  }
  return lines;
}

/** `<index>: tool=<name> | command=<text>` for the leading steps; all when `maxSteps` is null. */
export function formatToolHeaders(steps: Trajectory, maxSteps: number | null): string[] {
  const limit = maxSteps === null ? steps.length : Math.min(maxSteps, steps.length);
  const lines: string[] = [];
  for (const [offset, step] of steps.slice(0, limit).entries()) {
    const tool = toolNameOf(step) || UNKNOWN_TOOL;
    lines.push(`  ${offset + 1}: tool=${tool} | command=${commandTextOf(step)}`);
  }
  return lines;
}

function detailSection(title: string, steps: Trajectory, indices: StepIndexList): string[] {
  if (indices.length === 0) {
    return [`${title}: (none)`, ""];
  }

  const lines = [`${title}:`];
  for (const index of indices) {
    lines.push(...formatStepDetails(steps, index), "");
  }
  return lines;
}

export function spotcheckInstance(
  analyzer: TrajectoryAnalyzer,
  instanceId: string,
  maxToolSteps: number,
): string[] {
  const steps = analyzer.loadSteps(instanceId);
  const reproductionSteps = analyzer.locateReproductionCode(instanceId);
  const searchSteps = analyzer.locateSearch(instanceId);
  const toolCounts = analyzer.locateToolUse(instanceId);

  return [
    `Instance: ${instanceId}`,
    `Total steps: ${steps.length}`,
    `Reproduction steps: ${JSON.stringify(reproductionSteps)}`,
    `Search steps: ${JSON.stringify(searchSteps)}`,
    `Tool usage counts: ${formatClassificationResult(toolCounts)}`,
    "",
    ...detailSection("Reproduction step details", steps, reproductionSteps),
    ...detailSection("Search step details", steps, searchSteps),
    `First ${Math.min(maxToolSteps, steps.length)} steps (tool headers):`,
    ...formatToolHeaders(steps, maxToolSteps),
    "",
  ];
}
