import { z } from "zod";
import { isValidVersion } from "#/version";
import {
  ARTIFACT_GROUPS,
  ARTIFACT_KINDS,
  ARTIFACT_LABEL_REGEX,
  DEFAULT_MODELS_DIR,
} from "#/constants";
import { DEFAULT_INITIAL_VERSION } from "#/versionHandler";

// Semver validation schema
export const SemverSchema = z.string().refine(isValidVersion, {
  message: "Invalid semver version. Must be valid semver (e.g., 1.0.0, 2.1.0-beta.1)",
});

// Project config (modelver.yaml at the project root)
export const ModelverConfigSchema = z.object({
  modelsDir: z.string().trim().min(1).default(DEFAULT_MODELS_DIR), // relative to the project root
  strict: z.boolean().default(false), // fail on non-version directories instead of skipping them
  initialVersion: SemverSchema.default(DEFAULT_INITIAL_VERSION),
});
export type ModelverConfig = z.infer<typeof ModelverConfigSchema>;

export const ArtifactGroupSchema = z.enum(ARTIFACT_GROUPS);
export type ArtifactGroup = z.infer<typeof ArtifactGroupSchema>;

export const ArtifactKindSchema = z.enum(ARTIFACT_KINDS);
export type ArtifactKind = z.infer<typeof ArtifactKindSchema>;

export const ArtifactLabelSchema = z.string().regex(ARTIFACT_LABEL_REGEX, {
  message: "Must contain only letters, digits, '.', '_' or '-', and cannot be '.' or '..'",
});
