/**
 * Artifact types
 *
 * Payload files kept inside a version directory.
 */

import type { ArtifactGroup, ArtifactKind } from "#/schemas";

interface ArtifactBase {
  group: ArtifactGroup;
  label: string;
}

// Any JSON-serializable value: metrics, hyperparameters, feature lists
export interface JsonArtifact extends ArtifactBase {
  kind: "json";
  content: unknown;
}

// Plain text tables and reports (CSV, TSV, markdown)
export interface TextArtifact extends ArtifactBase {
  kind: "text";
  content: string;
}

// Serialized estimators and other opaque bytes
export interface BinaryArtifact extends ArtifactBase {
  kind: "binary";
  content: Buffer;
}

export type Artifact = JsonArtifact | TextArtifact | BinaryArtifact;

export interface ArtifactRef {
  group: ArtifactGroup;
  label: string;
  kind: ArtifactKind;
}

export interface StoredArtifact {
  group: ArtifactGroup;
  label: string;
  path: string;
  size: number;
}
