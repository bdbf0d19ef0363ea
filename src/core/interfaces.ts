import type {
  ClassificationResult,
  ClassifierKind,
  InstanceLocation,
} from "./types.js";

export interface InstanceResolver {
  /** Throws `InstanceNotFoundError` when no search root holds the instance. */
  locate(instanceId: string): InstanceLocation;
  /** Every instance with a trajectory file, in search-root then name order. */
  list(): InstanceLocation[];
}

export interface AuditSink {
  record(kind: ClassifierKind, instanceId: string, result: ClassificationResult): void;
}
