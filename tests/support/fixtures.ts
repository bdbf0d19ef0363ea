import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AnalyzerLogger } from "../../src/core/types.js";

const tempDirs: string[] = [];

export async function createTempRoot(prefix = "trajscope-"): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempRoots(): Promise<void> {
  while (tempDirs.length > 0) {
    const path = tempDirs.pop();
    if (!path) {
      continue;
    }
    await rm(path, { recursive: true, force: true });
  }
}

/** Writes `<rootDir>/<rootName>/<instanceId>/<instanceId>.traj` and returns its path. */
export async function writeInstance(
  rootDir: string,
  rootName: string,
  instanceId: string,
  content: string | Array<Record<string, unknown>>,
): Promise<string> {
  const instanceDir = join(rootDir, rootName, instanceId);
  await mkdir(instanceDir, { recursive: true });
  const path = join(instanceDir, `${instanceId}.traj`);
  const raw = typeof content === "string" ? content : JSON.stringify({ trajectory: content });
  await writeFile(path, raw, "utf-8");
  return path;
}

export class RecordingLogger implements AnalyzerLogger {
  readonly infos: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}
