export type { FileStat, FileSystem, PathConfig } from "./interfaces";
export { createNodeFileSystem } from "./node-fs";
