/**
 * Local filesystem storage backend. Donations land here when the flow runs
 * from the command line.
 */
import { mkdir, readdir, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";

import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(key: string): string {
    const full = resolve(this.basePath, key);
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new Error(`Key escapes storage root: ${key}`);
    }
    return full;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async list(prefix: string): Promise<string[]> {
    const prefixPath = this.resolve(prefix);
    try {
      const s = await stat(prefixPath);
      if (s.isFile()) return [prefix];
    } catch {
      return [];
    }

    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          // Keys always use forward slashes
          keys.push(relative(this.basePath, full).split(sep).join("/"));
        }
      }
    };

    await walk(prefixPath);
    return keys.sort();
  }
}
