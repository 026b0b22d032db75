export {
  ModelverError,
  InvalidVersionError,
  ExistingVersionError,
  MissingVersionError,
  NotADirectoryError,
  InvalidArtifactLabelError,
  ArtifactNotFoundError,
  InvalidArtifactContentError,
} from "./errors";
