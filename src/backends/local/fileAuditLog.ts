import { appendAuditLine } from "../../core/auditLog.js";
import type { AuditLogFiles } from "../../core/config.js";
import type { AuditSink } from "../../core/interfaces.js";
import type {
  AnalyzerLogger,
  ClassificationResult,
  ClassifierKind,
} from "../../core/types.js";

/** One append-only text file per classifier. */
export class FileAuditLog implements AuditSink {
  private readonly files: AuditLogFiles;
  private readonly logger: Pick<AnalyzerLogger, "warn">;

  constructor(files: AuditLogFiles, logger: Pick<AnalyzerLogger, "warn">) {
    this.files = files;
    this.logger = logger;
  }

  record(kind: ClassifierKind, instanceId: string, result: ClassificationResult): void {
    appendAuditLine(this.files[kind], instanceId, result, this.logger);
  }
}
