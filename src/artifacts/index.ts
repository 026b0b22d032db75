/**
 * Artifacts module
 *
 * Payload files (data tables, metrics, model binaries) stored per version.
 */

export { ArtifactStore } from "./artifacts";
export type {
  Artifact,
  ArtifactRef,
  BinaryArtifact,
  JsonArtifact,
  StoredArtifact,
  TextArtifact,
} from "./artifacts.types";
