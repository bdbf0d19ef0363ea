export class InstanceNotFoundError extends Error {
  readonly instanceId: string;
  readonly searched: string[];

  constructor(instanceId: string, searched: string[]) {
    super(
      `Could not find trajectory directory for '${instanceId}'. Looked in: ${searched.join(", ")}`,
    );
    this.name = "InstanceNotFoundError";
    this.instanceId = instanceId;
    this.searched = searched;
  }
}

export class TrajectoryFileMissingError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Trajectory file not found: ${path}`);
    this.name = "TrajectoryFileMissingError";
    this.path = path;
  }
}

export interface TrajectoryParseErrorDetails {
  line?: number;
  stepIndex?: number;
  cause?: unknown;
}

export class TrajectoryParseError extends Error {
  readonly path: string;
  readonly line?: number;
  readonly stepIndex?: number;

  constructor(message: string, path: string, details: TrajectoryParseErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "TrajectoryParseError";
    this.path = path;
    this.line = details.line;
    this.stepIndex = details.stepIndex;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
