import fs from "node:fs";
import path from "node:path";
import type { BuildArtifact, FieldValue, ManifestDocument } from "../types/manifest.js";
import type { ManifestFieldMap, VersionSourceConfig } from "../types/config.js";
import { execRunner, tail, type CommandResult, type CommandRunner } from "../core/command.js";
import { ReleaseError, errorMessage, preconditionFailure } from "../core/errors.js";
import { loadManifest, readFieldText, updateFields } from "../manifest/store.js";
import type { Diagnostic } from "../report/diagnostics.js";
import { digestFile } from "./checksum.js";

export type BuildInput = {
  /** Directory the toolchain runs in. */
  sourceDir: string;
  command: string;
  args?: string[];
  /** Toolchain output, relative to sourceDir. */
  outputPath: string;
  /** Fixed publish-facing location the binary is copied to. */
  publishPath: string;
  /** Explicit declared version; wins over versionSource. */
  version?: string;
  versionSource?: VersionSourceConfig;
};

/**
 * Declared semantic version of the artifact: the explicit value, or a field
 * of the toolchain's own manifest (e.g. Cargo.toml package.version).
 */
export function declaredVersion(input: Pick<BuildInput, "version" | "versionSource">): string {
  if (input.version !== undefined && input.version.trim() !== "") return input.version.trim();
  if (!input.versionSource) {
    throw preconditionFailure("No artifact version given and no version source configured");
  }
  const sourcePath = path.resolve(input.versionSource.path);
  const doc = loadManifest(sourcePath);
  const value = readFieldText(doc, input.versionSource.field);
  if (value === null || value.trim() === "") {
    throw preconditionFailure(`Field '${input.versionSource.field}' not found in ${sourcePath}`, {
      path: sourcePath,
      field: input.versionSource.field
    });
  }
  return value.trim();
}

/**
 * Artifact builder — runs the external toolchain, then measures and hashes
 * the binary it produced and copies it to the publish location.
 */
export class ArtifactBuilder {
  private readonly runner: CommandRunner;

  constructor(runner?: CommandRunner) {
    this.runner = runner ?? execRunner;
  }

  async build(input: BuildInput): Promise<BuildArtifact> {
    const sourceDir = path.resolve(input.sourceDir);
    if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
      throw preconditionFailure(`Build directory not found: ${sourceDir}`, { path: sourceDir });
    }
    // resolved before the build so a bad version source fails without side effects
    const version = declaredVersion(input);

    const args = input.args ?? [];
    let result: CommandResult;
    try {
      result = await this.runner(input.command, args, { cwd: sourceDir });
    } catch (e) {
      throw new ReleaseError("BuildFailure", `Could not start '${input.command}': ${errorMessage(e)}`, {
        stage: "build",
        cause: e,
        details: { command: input.command, args }
      });
    }
    if (result.exitCode !== 0) {
      throw new ReleaseError("BuildFailure", `'${[input.command, ...args].join(" ")}' exited with code ${result.exitCode}`, {
        stage: "build",
        details: { exitCode: result.exitCode, stderr: tail(result.stderr) }
      });
    }

    const outputPath = path.resolve(sourceDir, input.outputPath);
    if (!fs.existsSync(outputPath) || !fs.statSync(outputPath).isFile()) {
      throw new ReleaseError("ArtifactNotFound", `Build succeeded but no artifact at ${outputPath}`, {
        stage: "build",
        details: { path: outputPath }
      });
    }

    const publishPath = path.resolve(input.publishPath);
    fs.mkdirSync(path.dirname(publishPath), { recursive: true });
    fs.copyFileSync(outputPath, publishPath);

    const { size, sha256 } = digestFile(publishPath);
    return { path: publishPath, size, sha256, version };
  }
}

export function expandDownloadUrl(template: string, artifact: BuildArtifact): string {
  return template
    .replace(/\{version\}/g, artifact.version)
    .replace(/\{sha256\}/g, artifact.sha256)
    .replace(/\{file\}/g, path.basename(artifact.path));
}

/**
 * Write the artifact's size, hash and version (and download URL when
 * configured) into the manifest through targeted field updates.
 */
export function recordArtifact(
  doc: ManifestDocument,
  artifact: BuildArtifact,
  fields: ManifestFieldMap,
  downloadUrl?: string
): { document: ManifestDocument; changed: string[]; warnings: Diagnostic[] } {
  const updates: Array<[string, FieldValue]> = [
    [fields.artifact_size, artifact.size],
    [fields.artifact_hash, artifact.sha256],
    [fields.artifact_version, artifact.version]
  ];
  if (fields.artifact_url && downloadUrl) {
    updates.push([fields.artifact_url, expandDownloadUrl(downloadUrl, artifact)]);
  }
  return updateFields(doc, updates);
}
