/**
 * Global constants for the modelver engine
 */

export const CONFIG_FILE = "modelver.yaml";

export const DEFAULT_MODELS_DIR = "models";

// Subdirectories of a version directory that hold artifacts
export const ARTIFACT_GROUPS = [
  "data/raw",
  "data/interim",
  "data/transformed",
  "data/predicted",
  "model",
] as const;

export const ARTIFACT_KINDS = ["json", "text", "binary"] as const;

// Artifact file names: no path separators, not "." or ".."
export const ARTIFACT_LABEL_REGEX = /^(?!\.{1,2}$)[A-Za-z0-9._-]+$/;
