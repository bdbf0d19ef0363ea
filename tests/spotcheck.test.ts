import { afterEach, describe, expect, it } from "vitest";
import { createLocalAnalyzer } from "../src/backends/local/index.js";
import {
  formatStepDetails,
  formatToolHeaders,
  spotcheckInstance,
} from "../src/report/spotcheck.js";
import {
  RecordingLogger,
  createTempRoot,
  removeTempRoots,
  writeInstance,
} from "./support/fixtures.js";

afterEach(async () => {
  await removeTempRoots();
});

describe("formatStepDetails", () => {
  const steps = [
    {
      thought: "I will   create\na script",
      action: "str_replace_editor create /tmp/test_repro.py --file_text 'x'",
    },
  ];

  it("summarizes one step", () => {
    expect(formatStepDetails(steps, 1)).toEqual([
      "  Step 1:",
      "    Thought: I will create a script",
      "    Tool: str_replace_editor",
      "    Command: str_replace_editor create /tmp/test_repro.py ",
      "    Files: /tmp/test_repro.py",
    ]);
  });

  it("reports indices outside the trajectory", () => {
    expect(formatStepDetails(steps, 3)).toEqual(["  Step 3 is out of range for 1 steps"]);
    expect(formatStepDetails(steps, 0)).toEqual(["  Step 0 is out of range for 1 steps"]);
  });
});

describe("formatToolHeaders", () => {
  const steps = [{ tool: "bash", command: "ls" }, { thought: "x" }];

  it("lists leading steps with their tool and command", () => {
    expect(formatToolHeaders(steps, null)).toEqual([
      "  1: tool=bash | command=ls",
      "  2: tool=(unknown) | command=",
    ]);
    expect(formatToolHeaders(steps, 1)).toEqual(["  1: tool=bash | command=ls"]);
  });
});

describe("spotcheckInstance", () => {
  it("renders the raw results followed by step details", async () => {
    const rootDir = await createTempRoot();
    await writeInstance(rootDir, "claude-sonnet-trajs", "inst-s", [
      { action: "ls" },
      { thought: "plan" },
    ]);
    const { analyzer } = createLocalAnalyzer({
      config: { rootDir },
      env: {},
      logger: new RecordingLogger(),
    });

    expect(spotcheckInstance(analyzer, "inst-s", 20)).toEqual([
      "Instance: inst-s",
      "Total steps: 2",
      "Reproduction steps: []",
      "Search steps: [1]",
      'Tool usage counts: {"ls":1}',
      "",
      "Reproduction step details: (none)",
      "",
      "Search step details:",
      "  Step 1:",
      "    Tool: ls",
      "    Command: ls",
      "",
      "First 2 steps (tool headers):",
      "  1: tool=ls | command=ls",
      "  2: tool=(unknown) | command=",
      "",
    ]);
  });
});
