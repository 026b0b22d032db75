/**
 * Artifact store
 *
 * Saves and loads payload files under `<root>/<version>/<group>/<label>`.
 * Only versions already in the handler's history can hold artifacts; the store
 * never creates version directories itself.
 */

import { join } from "path";
import { ARTIFACT_GROUPS } from "#/constants";
import {
  ArtifactNotFoundError,
  InvalidArtifactContentError,
  InvalidArtifactLabelError,
  MissingVersionError,
} from "#/errors";
import { createChildLogger, type Logger } from "#/logger";
import { ArtifactLabelSchema, type ArtifactGroup } from "#/schemas";
import { Version, type VersionInput } from "#/version";
import type { VersionHandler } from "#/versionHandler";
import type { Artifact, ArtifactRef, StoredArtifact } from "./artifacts.types";

function assertValidLabel(label: string): void {
  const result = ArtifactLabelSchema.safeParse(label);
  if (!result.success) {
    throw new InvalidArtifactLabelError(label, result.error.issues[0]?.message ?? "invalid label");
  }
}

// undefined, functions and symbols have no JSON text; JSON.stringify returns undefined for them
function serializeJson(label: string, content: unknown): string {
  const text: string | undefined = JSON.stringify(content, null, 2);
  if (text === undefined) {
    throw new InvalidArtifactContentError(label, `${typeof content} has no JSON representation`);
  }
  return `${text}\n`;
}

export class ArtifactStore {
  private readonly log: Logger;

  constructor(
    private readonly handler: VersionHandler,
    logger?: Logger
  ) {
    this.log = (logger ?? createChildLogger({ module: "artifact-store" })).child({ root: handler.root });
  }

  /**
   * Write an artifact into an existing version, replacing any previous file
   * with the same group and label.
   *
   * @returns path of the written file
   */
  save(input: VersionInput, artifact: Artifact): string {
    assertValidLabel(artifact.label);
    const groupDir = this.groupDir(input, artifact.group);
    const path = join(groupDir, artifact.label);

    const payload = artifact.kind === "json" ? serializeJson(artifact.label, artifact.content) : artifact.content;

    this.handler.fs.mkdir(groupDir, { recursive: true });

    if (typeof payload === "string") {
      this.handler.fs.writeFile(path, payload);
    } else {
      this.handler.fs.writeFileBinary(path, payload);
    }

    this.log.info(
      { version: Version.from(input).format(), group: artifact.group, label: artifact.label },
      "Saved artifact"
    );
    return path;
  }

  load(input: VersionInput, ref: ArtifactRef): Artifact {
    assertValidLabel(ref.label);
    const path = join(this.groupDir(input, ref.group), ref.label);

    if (!this.handler.fs.exists(path) || !this.handler.fs.stat(path).isFile) {
      throw new ArtifactNotFoundError(path);
    }

    const { group, label } = ref;
    switch (ref.kind) {
      case "json": {
        const content: unknown = JSON.parse(this.handler.fs.readFile(path));
        return { kind: "json", group, label, content };
      }
      case "text":
        return { kind: "text", group, label, content: this.handler.fs.readFile(path) };
      case "binary":
        return { kind: "binary", group, label, content: this.handler.fs.readFileBinary(path) };
    }
  }

  /**
   * Artifacts stored in a version, in ARTIFACT_GROUPS order then by label.
   */
  list(input: VersionInput): StoredArtifact[] {
    const stored: StoredArtifact[] = [];

    for (const group of ARTIFACT_GROUPS) {
      const groupDir = this.groupDir(input, group);
      if (!this.handler.fs.exists(groupDir)) continue;

      for (const label of [...this.handler.fs.readdir(groupDir)].sort()) {
        const path = join(groupDir, label);
        const stat = this.handler.fs.stat(path);
        if (stat.isFile) {
          stored.push({ group, label, path, size: stat.size });
        }
      }
    }

    return stored;
  }

  private groupDir(input: VersionInput, group: ArtifactGroup): string {
    const version = Version.from(input);
    if (!this.handler.hasVersion(version)) {
      throw new MissingVersionError(version.format(), this.handler.root);
    }
    return join(this.handler.versionPath(this.resolveStored(version)), group);
  }

  // Directory names keep their build metadata, so 1.0.0 must map to 1.0.0+b1 on disk
  private resolveStored(version: Version): Version {
    return this.handler.history.find((existing) => existing.equals(version)) ?? version;
  }
}
