import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { type CliIo, CliUsageError, USAGE, parseCliArgs, runCli } from "../src/cli.js";
import { InstanceNotFoundError } from "../src/core/errors.js";
import { createTempRoot, removeTempRoots, writeInstance } from "./support/fixtures.js";

afterEach(async () => {
  await removeTempRoots();
});

function captureIo(): { out: string[]; err: string[]; io: CliIo } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    },
  };
}

describe("parseCliArgs", () => {
  it("parses a locate command with options", () => {
    const options = parseCliArgs([
      "locate_search",
      "sympy__sympy-1",
      "--root",
      "/data",
      "--search-root",
      "a=/x",
      "--search-root",
      "/y",
      "--log-dir",
      "logs",
    ]);

    expect(options.command).toBe("locate_search");
    expect(options.instanceId).toBe("sympy__sympy-1");
    expect(options.config).toEqual({
      rootDir: "/data",
      searchRoots: [
        { label: "a", dir: "/x" },
        { label: "y", dir: "/y" },
      ],
      logDir: "logs",
    });
  });

  it("parses spotcheck and sweep", () => {
    expect(parseCliArgs(["spotcheck", "inst", "--max-tool-steps", "5"]).maxToolSteps).toBe(5);
    expect(parseCliArgs(["sweep"]).instanceId).toBeNull();
    expect(parseCliArgs(["--help"]).help).toBe(true);
  });

  it("rejects malformed invocations", () => {
    expect(() => parseCliArgs([])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["toString", "inst"])).toThrow("unknown command: toString");
    expect(() => parseCliArgs(["locate_tool_use"])).toThrow(
      "locate_tool_use requires an instance id",
    );
    expect(() => parseCliArgs(["sweep", "inst"])).toThrow("sweep takes no instance id");
    expect(() => parseCliArgs(["locate_search", "inst", "--root"])).toThrow(
      "missing value for --root",
    );
    expect(() => parseCliArgs(["locate_search", "inst", "--verbose"])).toThrow(
      "unknown option: --verbose",
    );
    expect(() => parseCliArgs(["spotcheck", "inst", "--max-tool-steps", "5abc"])).toThrow(
      "invalid --max-tool-steps value: 5abc",
    );
  });
});

describe("runCli", () => {
  it("prints the raw classification result", async () => {
    const rootDir = await createTempRoot();
    await writeInstance(rootDir, "claude-sonnet-trajs", "inst-a", [
      { tool: "bash" },
      { thought: "no tool here" },
      { tool: "bash" },
    ]);
    const capture = captureIo();

    expect(runCli(["locate_tool_use", "inst-a", "--root", rootDir], capture.io, {})).toBe(0);
    expect(capture.out).toEqual(['{"bash":2}']);
    expect(capture.err).toEqual([]);
  });

  it("prints usage and exits 2 on a usage error", () => {
    const capture = captureIo();

    expect(runCli(["nope", "inst"], capture.io, {})).toBe(2);
    expect(capture.err).toEqual(["ERROR: unknown command: nope", USAGE]);
  });

  it("prints usage for --help", () => {
    const capture = captureIo();

    expect(runCli(["-h"], capture.io, {})).toBe(0);
    expect(capture.out).toEqual([USAGE]);
  });

  it("propagates resolution failures", async () => {
    const rootDir = await createTempRoot();
    const capture = captureIo();

    expect(() =>
      runCli(["locate_search", "ghost", "--root", rootDir], capture.io, {}),
    ).toThrow(InstanceNotFoundError);
  });

  it("runs a sweep and writes the report", async () => {
    const rootDir = await createTempRoot();
    await writeInstance(rootDir, "claude-sonnet-trajs", "inst-a", [{ action: "ls" }]);
    const capture = captureIo();

    expect(runCli(["sweep", "--root", rootDir], capture.io, {})).toBe(0);
    expect(capture.out).toEqual([
      'inst-a (claude) -> repro_steps=0, search_steps=1, tools={"ls":1}',
      "  WARNING: search steps high (1/1)",
    ]);
    expect(await readFile(join(rootDir, "trajscope_sweep_report.txt"), "utf-8")).toBe(
      `${capture.out.join("\n")}\n`,
    );
  });
});
