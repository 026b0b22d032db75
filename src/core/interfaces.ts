/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileStat {
  isDirectory: boolean;
  isFile: boolean;
  size: number;
}

/**
 * Filesystem capability consumed by the engine.
 *
 * `mkdir` without `recursive` must fail when the path already exists; version
 * allocation relies on that to never share a directory between two versions.
 */
export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  writeFile(path: string, content: string): void;
  writeFileBinary(path: string, content: Buffer): void;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  readdir(path: string): string[];
  stat(path: string): FileStat;
}

export interface PathConfig {
  projectRoot: string;
  configFile: string;
  modelsDir: string;
}
