import { existsSync, readFileSync, statSync } from "node:fs";
import { TrajectoryFileMissingError, TrajectoryParseError, errorMessage } from "./errors.js";
import type { Trajectory, TrajectoryStep } from "./types.js";

type JsonRecord = Record<string, unknown>;

function asRecord(value: unknown): JsonRecord | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return value as JsonRecord;
}

function parseJsonlValues(raw: string, sourcePath: string): unknown[] {
  const values: unknown[] = [];
  const lines = raw.split(/\r\n|\r|\n/);

  for (const [offset, line] of lines.entries()) {
    const stripped = line.trim();
    if (!stripped) {
      continue;
    }

    const lineNumber = offset + 1;
    try {
      values.push(JSON.parse(stripped) as unknown);
    } catch (error) {
      throw new TrajectoryParseError(
        `Failed to parse JSONL line ${lineNumber} in ${sourcePath}: ${errorMessage(error)}`,
        sourcePath,
        { line: lineNumber, cause: error },
      );
    }
  }

  if (values.length === 0) {
    throw new TrajectoryParseError(`No JSON objects found in ${sourcePath}`, sourcePath);
  }
  return values;
}

function parseDocument(raw: string, sourcePath: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return parseJsonlValues(raw, sourcePath);
  }
}

function stepListFromEnvelope(envelope: JsonRecord, sourcePath: string): unknown[] {
  const trajectory = envelope.trajectory;
  if (Array.isArray(trajectory)) {
    return trajectory;
  }

  const steps = envelope.steps;
  if (Array.isArray(steps)) {
    return steps;
  }

  for (const value of Object.values(envelope)) {
    if (Array.isArray(value) && value.length > 0) {
      return value;
    }
  }

  throw new TrajectoryParseError(`Unexpected trajectory format in ${sourcePath}`, sourcePath);
}

/**
 * Normalize trajectory text into steps. Accepts one JSON document (a list of
 * steps, or a mapping wrapping one under `trajectory`, `steps` or any other
 * non-empty list) or newline-delimited JSON. A single bad line rejects the
 * whole input.
 */
export function parseTrajectory(raw: string, sourcePath: string): Trajectory {
  const parsed = parseDocument(raw, sourcePath);

  let candidates: unknown[];
  const envelope = asRecord(parsed);
  if (envelope) {
    candidates = stepListFromEnvelope(envelope, sourcePath);
  } else if (Array.isArray(parsed)) {
    candidates = parsed;
  } else {
    throw new TrajectoryParseError(`Unsupported trajectory data in ${sourcePath}`, sourcePath);
  }

  if (candidates.length === 0) {
    throw new TrajectoryParseError(`No steps found in ${sourcePath}`, sourcePath);
  }

  const steps: TrajectoryStep[] = [];
  for (const [offset, candidate] of candidates.entries()) {
    const step = asRecord(candidate);
    if (!step) {
      const stepIndex = offset + 1;
      throw new TrajectoryParseError(
        `Step ${stepIndex} in ${sourcePath} is not an object`,
        sourcePath,
        { stepIndex },
      );
    }
    steps.push(step);
  }

  return steps;
}

export function loadTrajectory(trajectoryPath: string): Trajectory {
  if (!existsSync(trajectoryPath) || !statSync(trajectoryPath).isFile()) {
    throw new TrajectoryFileMissingError(trajectoryPath);
  }
  return parseTrajectory(readFileSync(trajectoryPath, "utf-8"), trajectoryPath);
}
