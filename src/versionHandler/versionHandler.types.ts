/**
 * Version handler types
 */

import type { FileSystem } from "#/core";
import type { Logger } from "#/logger";
import type { VersionInput } from "#/version";

export const DEFAULT_INITIAL_VERSION = "0.0.0";

export interface VersionHandlerOptions {
  /** Defaults to the Node.js filesystem */
  fs?: FileSystem;
  /**
   * Throw InvalidVersionError for subdirectories whose name is not a version,
   * instead of skipping them. Regular files are skipped either way.
   */
  strict?: boolean;
  logger?: Logger;
  /** Version created by init(), and the base addNextVersion() bumps from an empty history */
  initialVersion?: VersionInput;
}
