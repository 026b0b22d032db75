/**
 * Version value type
 *
 * Thin wrapper over the semver package. Parsing is strict: no "v" prefix, no
 * surrounding whitespace, no leading zeros. Ordering follows semver precedence,
 * so build metadata never takes part in comparison or equality.
 */

import semver, { type SemVer } from "semver";
import { InvalidVersionError } from "#/errors";

export type BumpType = "patch" | "minor" | "major";

export type VersionInput = Version | string;

export interface VersionLabels {
  prerelease?: readonly string[];
  build?: readonly string[];
}

const NUMERIC_IDENTIFIER = /^[0-9]+$/;

// semver compares numeric identifiers as numbers, so past 2^53 distinct ones collide
function isUnsafeNumericIdentifier(identifier: string | number): boolean {
  const text = String(identifier);
  return NUMERIC_IDENTIFIER.test(text) && !Number.isSafeInteger(Number(text));
}

function parseStrict(text: string): SemVer | null {
  // semver trims input and tolerates a leading "v"; directory names must not
  if (text !== text.trim() || text.startsWith("v") || text.startsWith("V")) {
    return null;
  }
  const parsed = semver.parse(text);
  if (parsed && parsed.prerelease.some(isUnsafeNumericIdentifier)) {
    return null;
  }
  return parsed;
}

function formatParts(major: number, minor: number, patch: number, labels: VersionLabels): string {
  const prerelease = labels.prerelease?.length ? `-${labels.prerelease.join(".")}` : "";
  const build = labels.build?.length ? `+${labels.build.join(".")}` : "";
  return `${major}.${minor}.${patch}${prerelease}${build}`;
}

export class Version {
  private constructor(private readonly parsed: SemVer) {}

  /**
   * Parse `MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD]`.
   * Throws InvalidVersionError when the text does not match the grammar.
   */
  static parse(text: string): Version {
    const parsed = parseStrict(text);
    if (!parsed) {
      throw new InvalidVersionError(text);
    }
    return new Version(parsed);
  }

  /**
   * Like parse, but returns null for invalid input.
   */
  static tryParse(text: string): Version | null {
    const parsed = parseStrict(text);
    return parsed ? new Version(parsed) : null;
  }

  /**
   * Build a version from explicit fields.
   *
   * @example Version.of(1, 2, 3, { prerelease: ["rc", "1"] }).format() → "1.2.3-rc.1"
   */
  static of(major: number, minor: number, patch: number, labels: VersionLabels = {}): Version {
    const text = formatParts(major, minor, patch, labels);
    for (const part of [major, minor, patch]) {
      if (!Number.isSafeInteger(part) || part < 0) {
        throw new InvalidVersionError(text);
      }
    }
    return Version.parse(text);
  }

  static from(input: VersionInput): Version {
    return input instanceof Version ? input : Version.parse(input);
  }

  get major(): number {
    return this.parsed.major;
  }

  get minor(): number {
    return this.parsed.minor;
  }

  get patch(): number {
    return this.parsed.patch;
  }

  get prerelease(): readonly string[] {
    return this.parsed.prerelease.map(String);
  }

  get build(): readonly string[] {
    return this.parsed.build;
  }

  get isPrerelease(): boolean {
    return this.parsed.prerelease.length > 0;
  }

  /**
   * Canonical string, build metadata included.
   * semver's own format() drops the build part, so it is appended here.
   */
  format(): string {
    return formatParts(this.major, this.minor, this.patch, {
      prerelease: this.prerelease,
      build: this.build,
    });
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }

  /**
   * Returns -1 if this < other, 0 if equal by precedence, 1 if this > other.
   */
  compare(other: VersionInput): -1 | 0 | 1 {
    return this.parsed.compare(Version.from(other).parsed);
  }

  equals(other: VersionInput): boolean {
    return this.compare(other) === 0;
  }

  greaterThan(other: VersionInput): boolean {
    return this.compare(other) === 1;
  }

  lessThan(other: VersionInput): boolean {
    return this.compare(other) === -1;
  }

  /**
   * Increment one component, reset the lower ones and drop both labels.
   *
   * Unlike semver.inc, a pre-release is always moved forward:
   * 1.2.3-alpha bumped by patch is 1.2.4, not 1.2.3.
   */
  bump(type: BumpType): Version {
    switch (type) {
      case "major":
        return Version.of(this.major + 1, 0, 0);
      case "minor":
        return Version.of(this.major, this.minor + 1, 0);
      case "patch":
        return Version.of(this.major, this.minor, this.patch + 1);
    }
  }
}

/**
 * Check if a string is a valid version.
 * Rejects versions with 'v' prefix (e.g., "v1.0.0" is invalid, "1.0.0" is valid).
 */
export function isValidVersion(text: string): boolean {
  return parseStrict(text) !== null;
}

/**
 * Comparator for Array.prototype.sort (ascending).
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  return a.compare(b);
}

/**
 * Sort versions in ascending order. Returns a new array.
 */
export function sortVersions(versions: readonly Version[]): Version[] {
  return [...versions].sort(compareVersions);
}

/**
 * Sort versions in descending order (highest first). Returns a new array.
 */
export function sortVersionsDesc(versions: readonly Version[]): Version[] {
  return [...versions].sort((a, b) => compareVersions(b, a));
}

/**
 * Get the highest version from a list.
 * Returns null if the list is empty.
 */
export function getHighestVersion(versions: readonly Version[]): Version | null {
  let highest: Version | null = null;
  for (const version of versions) {
    if (highest === null || version.greaterThan(highest)) {
      highest = version;
    }
  }
  return highest;
}
