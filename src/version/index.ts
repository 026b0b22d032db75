/**
 * Version module
 *
 * Semantic version parsing, formatting, ordering and bumping.
 */

export {
  Version,
  isValidVersion,
  compareVersions,
  sortVersions,
  sortVersionsDesc,
  getHighestVersion,
  type BumpType,
  type VersionInput,
  type VersionLabels,
} from "./version";
