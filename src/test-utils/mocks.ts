/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import { dirname } from "path";
import type { FileStat, FileSystem } from "#/core";

interface MockFileEntry {
  content: string | Buffer;
  isDirectory: boolean;
}

export type MockFileSystem = FileSystem & {
  files: Map<string, MockFileEntry>;
  /** Every path passed to mkdir, in call order */
  mkdirCalls: string[];
};

function fsError(code: string, message: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

function normalize(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Create a mock FileSystem with in-memory storage.
 *
 * Keys ending in "/" in `initialFiles` are created as empty directories, every
 * other key as a file. Parent directories are implied by their children.
 */
export function createMockFileSystem(initialFiles: Record<string, string | Buffer> = {}): MockFileSystem {
  const files = new Map<string, MockFileEntry>();
  const mkdirCalls: string[] = [];

  for (const [path, content] of Object.entries(initialFiles)) {
    if (path.endsWith("/")) {
      files.set(normalize(path), { content: "", isDirectory: true });
    } else {
      files.set(path, { content, isDirectory: false });
    }
  }

  function hasChildren(path: string): boolean {
    const prefix = path === "/" ? "/" : `${path}/`;
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  function exists(path: string): boolean {
    const normalizedPath = normalize(path);
    return normalizedPath === "/" || files.has(normalizedPath) || hasChildren(normalizedPath);
  }

  function isDirectory(path: string): boolean {
    const normalizedPath = normalize(path);
    const entry = files.get(normalizedPath);
    return entry ? entry.isDirectory : exists(normalizedPath);
  }

  function assertWritableParent(path: string): void {
    const parent = dirname(path);
    if (!isDirectory(parent)) {
      throw fsError("ENOENT", `no such file or directory, open '${path}'`);
    }
  }

  return {
    files,
    mkdirCalls,

    readFile(path: string): string {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw fsError("ENOENT", `no such file or directory, open '${path}'`);
      }
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw fsError("ENOENT", `no such file or directory, open '${path}'`);
      }
      return typeof entry.content === "string" ? Buffer.from(entry.content) : entry.content;
    },

    writeFile(path: string, content: string): void {
      assertWritableParent(path);
      files.set(path, { content, isDirectory: false });
    },

    writeFileBinary(path: string, content: Buffer): void {
      assertWritableParent(path);
      files.set(path, { content: Buffer.from(content), isDirectory: false });
    },

    exists,

    mkdir(path: string, options?: { recursive?: boolean }): void {
      const normalizedPath = normalize(path);
      mkdirCalls.push(normalizedPath);

      if (options?.recursive) {
        let current = normalizedPath;
        while (current !== "/" && !exists(current)) {
          files.set(current, { content: "", isDirectory: true });
          current = dirname(current);
        }
        return;
      }

      if (exists(normalizedPath)) {
        throw fsError("EEXIST", `file already exists, mkdir '${path}'`);
      }
      if (!isDirectory(dirname(normalizedPath))) {
        throw fsError("ENOENT", `no such file or directory, mkdir '${path}'`);
      }
      files.set(normalizedPath, { content: "", isDirectory: true });
    },

    readdir(path: string): string[] {
      const normalizedPath = normalize(path);
      if (!isDirectory(normalizedPath)) {
        throw fsError("ENOTDIR", `not a directory, scandir '${path}'`);
      }

      const prefix = normalizedPath === "/" ? "/" : `${normalizedPath}/`;
      const results: Set<string> = new Set();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(prefix)) {
          const firstPart = filePath.slice(prefix.length).split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    stat(path: string): FileStat {
      const normalizedPath = normalize(path);
      const entry = files.get(normalizedPath);

      if (!entry) {
        if (exists(normalizedPath)) {
          return { isDirectory: true, isFile: false, size: 0 };
        }
        throw fsError("ENOENT", `no such file or directory, stat '${path}'`);
      }

      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0 };
      }

      return { isDirectory: false, isFile: true, size: entry.content.length };
    },
  };
}
