/**
 * Version handler
 *
 * Tracks the versions of one model as subdirectories of a root directory,
 * one per version, named by the version's canonical string.
 *
 * History is read through a cache: the root is scanned on first access and the
 * cache is kept current after every successful addNewVersion(). Other writers
 * to the same root are not seen until refresh(). There is no locking, so two
 * processes adding the same version can both pass the duplicate check; the
 * later non-recursive mkdir then fails with the filesystem's own error.
 */

import { join, resolve } from "path";
import { createNodeFileSystem, type FileStat, type FileSystem } from "#/core";
import { ExistingVersionError, InvalidVersionError, NotADirectoryError } from "#/errors";
import { createChildLogger, type Logger } from "#/logger";
import {
  Version,
  getHighestVersion,
  sortVersions,
  type BumpType,
  type VersionInput,
} from "#/version";
import { DEFAULT_INITIAL_VERSION, type VersionHandlerOptions } from "./versionHandler.types";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class VersionHandler {
  readonly root: string;
  readonly initialVersion: Version;
  readonly fs: FileSystem;

  private readonly strict: boolean;
  private readonly log: Logger;
  private cache: Version[] | null = null;

  constructor(root: string, options: VersionHandlerOptions = {}) {
    this.root = resolve(root);
    this.fs = options.fs ?? createNodeFileSystem();
    this.strict = options.strict ?? false;
    this.log = (options.logger ?? createChildLogger({ module: "version-handler" })).child({ root: this.root });
    this.initialVersion = Version.from(options.initialVersion ?? DEFAULT_INITIAL_VERSION);

    this.ensureRoot();
  }

  /**
   * All versions found in the root, ascending.
   */
  get history(): readonly Version[] {
    return [...this.loadHistory()];
  }

  /**
   * Highest version in the root, or null when there is none yet.
   */
  get latestVersion(): Version | null {
    return getHighestVersion(this.loadHistory());
  }

  /**
   * Create the directory for a new version.
   *
   * Rejects only an exact duplicate (build metadata ignored); a version lower
   * than latestVersion is accepted. Use addNextVersion() for strict increase.
   *
   * @throws InvalidVersionError when a string input does not parse
   * @throws ExistingVersionError when an equal version is already present
   */
  addNewVersion(input: VersionInput): Version {
    const version = Version.from(input);
    const history = this.loadHistory();

    if (history.some((existing) => existing.equals(version))) {
      throw new ExistingVersionError(version.format(), this.root);
    }

    this.fs.mkdir(this.versionPath(version));
    this.cache = sortVersions([...history, version]);

    this.log.info({ version: version.format() }, "Created version directory");
    return version;
  }

  /**
   * Bump the latest version (or the initial version when empty) and add it.
   */
  addNextVersion(type: BumpType): Version {
    const base = this.latestVersion ?? this.initialVersion;
    return this.addNewVersion(base.bump(type));
  }

  /**
   * Start versioning by adding the initial version.
   */
  init(): Version {
    return this.addNewVersion(this.initialVersion);
  }

  hasVersion(input: VersionInput): boolean {
    const version = Version.from(input);
    return this.loadHistory().some((existing) => existing.equals(version));
  }

  /**
   * Directory a version lives in, whether or not it exists yet.
   */
  versionPath(input: VersionInput): string {
    return join(this.root, Version.from(input).format());
  }

  /**
   * Drop the cached history; the next read scans the root again.
   */
  refresh(): void {
    this.cache = null;
  }

  private ensureRoot(): void {
    if (!this.fs.exists(this.root)) {
      this.fs.mkdir(this.root, { recursive: true });
      this.log.info("Created versions root");
      return;
    }

    if (!this.fs.stat(this.root).isDirectory) {
      throw new NotADirectoryError(this.root);
    }
  }

  private loadHistory(): Version[] {
    if (this.cache === null) {
      this.cache = this.scan();
    }
    return this.cache;
  }

  private scan(): Version[] {
    const versions: Version[] = [];
    const skipped: string[] = [];

    for (const entry of this.fs.readdir(this.root)) {
      if (!this.statEntry(entry)?.isDirectory) {
        continue;
      }

      const version = Version.tryParse(entry);
      if (version) {
        versions.push(version);
        continue;
      }

      if (this.strict) {
        throw new InvalidVersionError(entry, `'${entry}' in ${this.root} is not a valid version.`);
      }
      skipped.push(entry);
    }

    if (skipped.length > 0) {
      this.log.warn({ skipped }, "Skipped directories that are not versions");
    }
    this.log.debug({ found: versions.length, skipped }, "Scanned version history");
    return sortVersions(versions);
  }

  /**
   * Stat a root entry, or null when it is gone: removed after readdir, or a
   * symlink whose target does not exist.
   */
  private statEntry(entry: string): FileStat | null {
    try {
      return this.fs.stat(join(this.root, entry));
    } catch (err) {
      if (isNotFound(err)) {
        this.log.debug({ entry }, "Entry vanished during scan");
        return null;
      }
      throw err;
    }
  }
}
