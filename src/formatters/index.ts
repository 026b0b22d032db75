import type { StoredArtifact } from "#/artifacts";
import type { Version } from "#/version";

/**
 * Format bytes to human readable string.
 *
 * @example formatBytes(500) → "500 B"
 * @example formatBytes(1536) → "1.5 KB"
 * @example formatBytes(1572864) → "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * One line per version, newest first, the latest one marked.
 *
 * @example formatHistory([1.0.0, 2.0.0], 2.0.0) → ["2.0.0 (latest)", "1.0.0"]
 */
export function formatHistory(history: readonly Version[], latest: Version | null): string[] {
  if (history.length === 0) {
    return ["(no versions)"];
  }

  return [...history].reverse().map((version) => {
    const isLatest = latest !== null && version.equals(latest);
    return isLatest ? `${version.format()} (latest)` : version.format();
  });
}

/**
 * @example formatArtifactList([{ group: "model", label: "weights.bin", size: 1536, ... }]) → ["model/weights.bin  1.5 KB"]
 */
export function formatArtifactList(artifacts: readonly StoredArtifact[]): string[] {
  return artifacts.map((artifact) => `${artifact.group}/${artifact.label}  ${formatBytes(artifact.size)}`);
}
