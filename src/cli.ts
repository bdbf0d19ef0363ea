import { createLocalAnalyzer } from "./backends/local/index.js";
import type { AnalyzerConfigOverrides, ConfigEnv } from "./core/config.js";
import { parseCount, parseSearchRoots } from "./core/config.js";
import { formatClassificationResult } from "./core/classifiers.js";
import type { AnalyzerLogger, ClassifierKind } from "./core/types.js";
import { spotcheckInstance } from "./report/spotcheck.js";
import { runSweep } from "./report/sweep.js";

export const LOCATE_COMMANDS = {
  locate_reproduction_code: "reproduction",
  locate_search: "search",
  locate_tool_use: "toolUse",
} as const satisfies Record<string, ClassifierKind>;

type LocateCommand = keyof typeof LOCATE_COMMANDS;

export type CliCommand = LocateCommand | "spotcheck" | "sweep";

export interface CliOptions {
  command: CliCommand | null;
  instanceId: string | null;
  maxToolSteps?: number;
  config: AnalyzerConfigOverrides;
  help: boolean;
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `Usage: trajscope <command> [instance_id] [options]

Commands:
  locate_reproduction_code <id>   Steps that create reproduction or test code
  locate_search <id>              Navigation and search steps
  locate_tool_use <id>            Invocation count per tool
  spotcheck <id>                  Detailed listing of all three results
  sweep                           Run every classifier over every instance

Options:
  --root DIR                      Base directory (default: cwd, env TRAJSCOPE_ROOT)
  --search-root [LABEL=]DIR       Trajectory root, repeatable, in preference order
  --log-dir DIR                   Directory for the audit logs
  --max-tool-steps N              Steps listed by spotcheck (default: 20)
  --help, -h                      Print this help`;

function isCliCommand(value: string): value is CliCommand {
  return Object.hasOwn(LOCATE_COMMANDS, value) || value === "spotcheck" || value === "sweep";
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`missing value for ${flag}`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    command: null,
    instanceId: null,
    config: {},
    help: false,
  };
  const positionals: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";
    const value = argv[index + 1];

    if (token === "--help" || token === "-h") {
      options.help = true;
      continue;
    }
    if (token === "--root") {
      options.config.rootDir = requireValue(token, value);
      index += 1;
      continue;
    }
    if (token === "--search-root") {
      const roots = parseSearchRoots(requireValue(token, value));
      options.config.searchRoots = [...(options.config.searchRoots ?? []), ...roots];
      index += 1;
      continue;
    }
    if (token === "--log-dir") {
      options.config.logDir = requireValue(token, value);
      index += 1;
      continue;
    }
    if (token === "--max-tool-steps") {
      const raw = requireValue(token, value);
      const count = parseCount(raw);
      if (count === undefined) {
        throw new CliUsageError(`invalid ${token} value: ${raw}`);
      }
      options.maxToolSteps = count;
      index += 1;
      continue;
    }
    if (token.startsWith("--")) {
      throw new CliUsageError(`unknown option: ${token}`);
    }
    positionals.push(token);
  }

  if (options.help) {
    return options;
  }

  const [command, instanceId, ...extra] = positionals;
  if (!command) {
    throw new CliUsageError("missing command");
  }
  if (!isCliCommand(command)) {
    throw new CliUsageError(`unknown command: ${command}`);
  }
  options.command = command;

  if (command === "sweep") {
    if (instanceId !== undefined) {
      throw new CliUsageError("sweep takes no instance id");
    }
    return options;
  }

  if (!instanceId) {
    throw new CliUsageError(`${command} requires an instance id`);
  }
  if (extra.length > 0) {
    throw new CliUsageError(`unexpected arguments: ${extra.join(" ")}`);
  }
  options.instanceId = instanceId;
  return options;
}

function loggerFor(io: CliIo): AnalyzerLogger {
  return {
    info: (message) => io.err(message),
    warn: (message) => io.err(`WARNING: ${message}`),
    error: (message) => io.err(`ERROR: ${message}`),
  };
}

/**
 * Returns the exit code for usage problems and successful runs. Resolution,
 * missing-file and parse failures are thrown to the caller.
 */
export function runCli(argv: string[], io: CliIo, env: ConfigEnv = process.env): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.err(`ERROR: ${error.message}`);
      io.err(USAGE);
      return 2;
    }
    throw error;
  }

  const command = options.command;
  if (options.help || !command) {
    io.out(USAGE);
    return 0;
  }

  const { analyzer, config } = createLocalAnalyzer({
    config: options.config,
    env,
    logger: loggerFor(io),
  });

  if (command === "sweep") {
    runSweep(analyzer, {
      reportPath: config.sweepReportPath,
      emit: (line) => io.out(line),
    });
    return 0;
  }

  const instanceId = options.instanceId ?? "";
  if (command === "spotcheck") {
    const lines = spotcheckInstance(
      analyzer,
      instanceId,
      options.maxToolSteps ?? config.spotcheckMaxSteps,
    );
    for (const line of lines) {
      io.out(line);
    }
    return 0;
  }

  const result = analyzer.analyze(LOCATE_COMMANDS[command], instanceId);
  io.out(formatClassificationResult(result));
  return 0;
}
