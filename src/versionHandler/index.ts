/**
 * Version handler module
 *
 * Version history of one model directory.
 */

export { VersionHandler } from "./versionHandler";
export { DEFAULT_INITIAL_VERSION, type VersionHandlerOptions } from "./versionHandler.types";
