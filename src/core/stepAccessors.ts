import { actionHeader } from "./signatures.js";
import type { TrajectoryStep } from "./types.js";

const TOOL_NAME_FIELDS = ["tool", "tool_name", "name"] as const;
const TOOL_ACTION_FIELDS = ["action", "command"] as const;
const COMMAND_TEXT_FIELDS = ["command", "args", "input"] as const;
const RAW_ACTION_FIELDS = ["action", "tool", "command"] as const;

export function toText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    return "[unserializable-value]";
  }
}

/**
 * Whether a field carries something usable. Empty strings, zero, false, and
 * empty containers count as absent so the fallback chain moves on.
 */
export function isPresent(value: unknown): boolean {
  if (value === null || value === undefined || value === false) {
    return false;
  }
  if (typeof value === "string") {
    return value.length > 0;
  }
  if (typeof value === "number") {
    return value !== 0 && !Number.isNaN(value);
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === "object") {
    return Object.keys(value).length > 0;
  }
  return true;
}

function firstPresentText(step: TrajectoryStep, fields: readonly string[]): string | null {
  for (const field of fields) {
    const value = step[field];
    if (isPresent(value)) {
      return toText(value);
    }
  }
  return null;
}

/**
 * Tool identifier of a step. Explicit fields win; otherwise the first token of
 * the action header, which folds editor subcommands into the base tool name.
 * An empty string means the tool is unknown.
 */
export function toolNameOf(step: TrajectoryStep): string {
  const explicit = firstPresentText(step, TOOL_NAME_FIELDS);
  if (explicit !== null) {
    return explicit;
  }

  const header = actionHeader(firstPresentText(step, TOOL_ACTION_FIELDS) ?? "");
  return header.trim().split(/\s+/)[0] ?? "";
}

export function commandTextOf(step: TrajectoryStep): string {
  const explicit = firstPresentText(step, COMMAND_TEXT_FIELDS);
  if (explicit !== null) {
    return explicit;
  }
  return actionHeader(firstPresentText(step, ["action"]) ?? "");
}

/** Free text of what ran, for the reproduction heuristic. */
export function rawActionOf(step: TrajectoryStep): string {
  return firstPresentText(step, RAW_ACTION_FIELDS) ?? "";
}

export function thoughtOf(step: TrajectoryStep): string {
  return firstPresentText(step, ["thought"]) ?? "";
}
