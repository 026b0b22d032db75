import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "fs";
import type { FileStat, FileSystem } from "./interfaces";

/**
 * FileSystem backed by Node's synchronous fs API.
 */
export function createNodeFileSystem(): FileSystem {
  return {
    readFile(path: string): string {
      return readFileSync(path, "utf-8");
    },

    readFileBinary(path: string): Buffer {
      return readFileSync(path);
    },

    writeFile(path: string, content: string): void {
      writeFileSync(path, content, "utf-8");
    },

    writeFileBinary(path: string, content: Buffer): void {
      writeFileSync(path, content);
    },

    exists(path: string): boolean {
      return existsSync(path);
    },

    mkdir(path: string, options?: { recursive?: boolean }): void {
      mkdirSync(path, { recursive: options?.recursive ?? false });
    },

    readdir(path: string): string[] {
      return readdirSync(path);
    },

    stat(path: string): FileStat {
      const stats = statSync(path);
      return {
        isDirectory: stats.isDirectory(),
        isFile: stats.isFile(),
        size: stats.size,
      };
    },
  };
}
