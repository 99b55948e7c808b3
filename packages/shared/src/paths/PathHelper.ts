import path from "node:path";
import { promises as fs } from "node:fs";

/**
 * Resolves where a workspace keeps its index and logs.
 */
export class PathHelper {
  static getWorkspaceDir(cwd: string = process.cwd()): string {
    return path.join(cwd, ".lectern");
  }

  static getIndexPath(cwd: string = process.cwd()): string {
    return path.join(this.getWorkspaceDir(cwd), "index.db");
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}
