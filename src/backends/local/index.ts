import { TrajectoryAnalyzer } from "../../core/analyzer.js";
import {
  type AnalyzerConfig,
  type AnalyzerConfigOverrides,
  type ConfigEnv,
  resolveAnalyzerConfig,
} from "../../core/config.js";
import type { AnalyzerLogger } from "../../core/types.js";
import { FileAuditLog } from "./fileAuditLog.js";
import { DirectoryInstanceResolver } from "./instanceResolver.js";

export interface LocalAnalyzerOptions {
  config?: AnalyzerConfigOverrides;
  env?: ConfigEnv;
  logger?: AnalyzerLogger;
}

export interface LocalAnalyzer {
  analyzer: TrajectoryAnalyzer;
  config: AnalyzerConfig;
  logger: AnalyzerLogger;
}

export function createLocalAnalyzer(options: LocalAnalyzerOptions = {}): LocalAnalyzer {
  const config = resolveAnalyzerConfig(options.config, options.env);
  const logger = options.logger ?? console;

  const analyzer = new TrajectoryAnalyzer({
    resolver: new DirectoryInstanceResolver(config.searchRoots, config.trajectoryExtension),
    audit: new FileAuditLog(config.logFiles, logger),
  });

  return { analyzer, config, logger };
}

export { DirectoryInstanceResolver };
export { FileAuditLog };
