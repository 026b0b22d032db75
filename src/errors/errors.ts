/**
 * Error classes
 *
 * Every failure the engine raises on purpose is a ModelverError, so callers can
 * separate them from filesystem errors with a single instanceof check.
 */

export class ModelverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelverError";
  }
}

/**
 * Input is not a `MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD]` version.
 */
export class InvalidVersionError extends ModelverError {
  constructor(
    public readonly input: string,
    message = `'${input}' is not a valid version format.`
  ) {
    super(message);
    this.name = "InvalidVersionError";
  }
}

export class ExistingVersionError extends ModelverError {
  constructor(
    public readonly version: string,
    public readonly root: string
  ) {
    super(`Unable to add version ${version} because it already exists in the folder ${root}.`);
    this.name = "ExistingVersionError";
  }
}

export class MissingVersionError extends ModelverError {
  constructor(
    public readonly version: string,
    public readonly root: string
  ) {
    super(`Version ${version} does not exist in the folder ${root}.`);
    this.name = "MissingVersionError";
  }
}

export class NotADirectoryError extends ModelverError {
  constructor(public readonly path: string) {
    super(`'${path}' exists but is not a directory.`);
    this.name = "NotADirectoryError";
  }
}

export class InvalidArtifactLabelError extends ModelverError {
  constructor(
    public readonly label: string,
    reason: string
  ) {
    super(`Invalid artifact label '${label}': ${reason}`);
    this.name = "InvalidArtifactLabelError";
  }
}

export class ArtifactNotFoundError extends ModelverError {
  constructor(public readonly path: string) {
    super(`The artifact file '${path}' does not exist.`);
    this.name = "ArtifactNotFoundError";
  }
}

export class InvalidArtifactContentError extends ModelverError {
  constructor(
    public readonly label: string,
    reason: string
  ) {
    super(`Cannot save artifact '${label}': ${reason}`);
    this.name = "InvalidArtifactContentError";
  }
}
