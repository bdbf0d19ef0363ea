import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { InstanceNotFoundError } from "../../core/errors.js";
import type { InstanceResolver } from "../../core/interfaces.js";
import type { InstanceLocation, SearchRoot } from "../../core/types.js";

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Finds `<root>/<instanceId>/<instanceId><extension>` across ordered search
 * roots. The first root holding an instance directory wins.
 */
export class DirectoryInstanceResolver implements InstanceResolver {
  private readonly searchRoots: SearchRoot[];
  private readonly extension: string;

  constructor(searchRoots: SearchRoot[], extension: string) {
    this.searchRoots = searchRoots;
    this.extension = extension;
  }

  locate(instanceId: string): InstanceLocation {
    const searched: string[] = [];
    for (const root of this.searchRoots) {
      const instanceDir = join(root.dir, instanceId);
      searched.push(instanceDir);
      if (isDirectory(instanceDir)) {
        return this.location(root, instanceId);
      }
    }

    throw new InstanceNotFoundError(instanceId, searched);
  }

  list(): InstanceLocation[] {
    const output: InstanceLocation[] = [];
    for (const root of this.searchRoots) {
      if (!isDirectory(root.dir)) {
        continue;
      }

      const children = readdirSync(root.dir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));

      for (const instanceId of children) {
        const location = this.location(root, instanceId);
        if (isFile(location.trajectoryPath)) {
          output.push(location);
        }
      }
    }
    return output;
  }

  private location(root: SearchRoot, instanceId: string): InstanceLocation {
    const instanceDir = join(root.dir, instanceId);
    return {
      instanceId,
      label: root.label,
      instanceDir,
      trajectoryPath: join(instanceDir, `${instanceId}${this.extension}`),
    };
  }
}
