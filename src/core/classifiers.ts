import {
  FILE_KEYWORDS,
  THOUGHT_KEYWORDS,
  actionHeader,
  extractFilenames,
  hasKeyword,
  isCreationAction,
} from "./signatures.js";
import { commandTextOf, rawActionOf, thoughtOf, toolNameOf } from "./stepAccessors.js";
import type {
  ClassificationResult,
  StepIndexList,
  ToolUsageCounts,
  Trajectory,
  TrajectoryStep,
} from "./types.js";

export const SEARCH_TOOL_NAMES: ReadonlySet<string> = new Set([
  "find_file",
  "search_file",
  "search_dir",
]);

export const EDITOR_TOOL_NAME = "str_replace_editor";

// Word boundaries count any Unicode letter or digit as part of a word.
const SHELL_SEARCH_VERB_PATTERN =
  /(?<![\p{L}\p{N}_])(find|grep|rg|fd|ls|cd|cat|tree|ag|pwd)(?![\p{L}\p{N}_])/u;

/**
 * A step creates reproduction code when its header writes a file and either a
 * written filename, the header, or the accompanying thought mentions testing
 * or reproduction. Non-creating steps never match.
 */
export function isReproductionStep(step: TrajectoryStep): boolean {
  const header = actionHeader(rawActionOf(step));
  if (!isCreationAction(header)) {
    return false;
  }

  const filenames = extractFilenames(header);
  if (filenames.length > 0 && hasKeyword(filenames.join(" "), FILE_KEYWORDS)) {
    return true;
  }

  if (hasKeyword(header, FILE_KEYWORDS)) {
    return true;
  }

  const thought = thoughtOf(step);
  return thought.length > 0 && hasKeyword(thought, THOUGHT_KEYWORDS);
}

export function isSearchStep(step: TrajectoryStep): boolean {
  const toolName = toolNameOf(step).toLowerCase();
  const command = commandTextOf(step).toLowerCase();

  if (SEARCH_TOOL_NAMES.has(toolName)) {
    return true;
  }

  // Viewing a file through the editor counts as navigation.
  if (toolName === EDITOR_TOOL_NAME && command.includes("view")) {
    return true;
  }

  return SHELL_SEARCH_VERB_PATTERN.test(command);
}

function matchingIndices(
  steps: Trajectory,
  predicate: (step: TrajectoryStep) => boolean,
): StepIndexList {
  const output: StepIndexList = [];
  for (const [offset, step] of steps.entries()) {
    if (predicate(step)) {
      output.push(offset + 1);
    }
  }
  return output;
}

export function classifyReproductionSteps(steps: Trajectory): StepIndexList {
  return matchingIndices(steps, isReproductionStep);
}

export function classifySearchSteps(steps: Trajectory): StepIndexList {
  return matchingIndices(steps, isSearchStep);
}

export function countToolUse(steps: Trajectory): ToolUsageCounts {
  const counts = new Map<string, number>();
  for (const step of steps) {
    const toolName = toolNameOf(step).trim();
    if (!toolName) {
      continue;
    }
    counts.set(toolName, (counts.get(toolName) ?? 0) + 1);
  }

  return new Map(
    [...counts.entries()].sort(([left], [right]) => compareCodeUnits(left, right)),
  );
}

/** JSON rendering that keeps the result's own key order. */
export function formatClassificationResult(result: ClassificationResult): string {
  if (Array.isArray(result)) {
    return JSON.stringify(result);
  }
  const entries = [...result.entries()].map(
    ([name, count]) => `${JSON.stringify(name)}:${count}`,
  );
  return `{${entries.join(",")}}`;
}

function compareCodeUnits(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}
