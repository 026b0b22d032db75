/**
 * Project configuration
 *
 * Reads modelver.yaml from the project root and binds a VersionHandler to the
 * models directory it names.
 */

import { join, resolve } from "path";
import type { FileSystem, PathConfig } from "#/core";
import { CONFIG_FILE } from "#/constants";
import { loadYamlSettings, type ParseResult } from "#/friendly-errors";
import type { Logger } from "#/logger";
import { ModelverConfigSchema, type ModelverConfig } from "#/schemas";
import { VersionHandler } from "#/versionHandler";

export function createDefaultConfig(): ModelverConfig {
  return ModelverConfigSchema.parse({});
}

/**
 * Load modelver.yaml. A missing or empty file yields the defaults.
 */
export function loadConfig(fs: FileSystem, projectRoot: string): ParseResult<ModelverConfig> {
  return loadYamlSettings(fs, join(projectRoot, CONFIG_FILE), ModelverConfigSchema);
}

export function resolvePaths(projectRoot: string, config: ModelverConfig): PathConfig {
  const root = resolve(projectRoot);
  return {
    projectRoot: root,
    configFile: join(root, CONFIG_FILE),
    modelsDir: resolve(root, config.modelsDir),
  };
}

/**
 * Bind a VersionHandler to the configured models directory.
 */
export function createVersionHandler(
  fs: FileSystem,
  projectRoot: string,
  config: ModelverConfig,
  logger?: Logger
): VersionHandler {
  const { modelsDir } = resolvePaths(projectRoot, config);

  return new VersionHandler(modelsDir, {
    fs,
    strict: config.strict,
    initialVersion: config.initialVersion,
    logger,
  });
}
