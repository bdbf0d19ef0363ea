import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { formatClassificationResult } from "./classifiers.js";
import { errorMessage } from "./errors.js";
import type { AnalyzerLogger, ClassificationResult } from "./types.js";

export function formatAuditLine(instanceId: string, result: ClassificationResult): string {
  return `${instanceId}: ${formatClassificationResult(result)}\n`;
}

/**
 * Append one diagnostic line. Write failures are reported as a warning and
 * never reach the caller.
 */
export function appendAuditLine(
  logPath: string,
  instanceId: string,
  result: ClassificationResult,
  logger: Pick<AnalyzerLogger, "warn">,
): void {
  try {
    mkdirSync(dirname(logPath), { recursive: true });
    appendFileSync(logPath, formatAuditLine(instanceId, result), { encoding: "utf-8" });
  } catch (error) {
    logger.warn(`Failed to write log: ${errorMessage(error)}`);
  }
}
