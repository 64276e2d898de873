import fs from "node:fs";
import path from "node:path";
import type { PackshipConfig } from "../types/config.js";
import { errorMessage } from "../core/errors.js";
import { loadConfig } from "../config/loader.js";
import { loadManifest, readField } from "../manifest/store.js";
import { isWorkingCopy } from "../distribution/stager.js";
import { diag, type Diagnostic } from "../report/diagnostics.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import type { CommandOptions } from "./common.js";

export type ValidateResult =
  | { ok: true; warnings: Diagnostic[] }
  | { ok: false; errors: Diagnostic[]; warnings: Diagnostic[]; exitCode: ExitCode };

function isDir(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

function checkManifest(config: PackshipConfig, root: string, errors: Diagnostic[], warnings: Diagnostic[]): void {
  const manifestPath = path.resolve(root, config.manifest.path);
  if (!fs.existsSync(manifestPath)) {
    errors.push(diag("error", "MANIFEST_MISSING", `Manifest not found: ${manifestPath}`, { details: { path: manifestPath } }));
    return;
  }
  const doc = loadManifest(manifestPath, config.manifest.format);
  const { artifact_url, ...required } = config.manifest.fields;
  const fields = Object.values(required);
  if (artifact_url && config.build?.download_url) fields.push(artifact_url);

  for (const field of fields) {
    if (readField(doc, field) === null) {
      warnings.push(
        diag("warn", "FIELD_NOT_FOUND", `Field '${field}' not found in ${manifestPath}`, {
          details: { path: manifestPath, field }
        })
      );
    }
  }
}

/**
 * Check the config and the files it points at without running anything:
 * the manifest and its fields, the build and index directories, and the
 * mirror working copy.
 */
export function validateProject(opts: CommandOptions, environment?: NodeJS.ProcessEnv): ValidateResult {
  const configDir = path.resolve(opts.configDir);
  if (!isDir(configDir)) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`, { details: { path: configDir } })],
      warnings: [],
      exitCode: EXIT.PRECONDITION_FAILED
    };
  }

  let config: PackshipConfig;
  try {
    config = loadConfig(opts.env, configDir, environment);
  } catch (e) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_INVALID", errorMessage(e), { details: { path: configDir } })],
      warnings: [],
      exitCode: EXIT.PRECONDITION_FAILED
    };
  }

  const root = path.resolve(opts.rootDir ?? process.cwd());
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  checkManifest(config, root, errors, warnings);

  if (config.build) {
    const sourceDir = path.resolve(root, config.build.source_dir);
    if (!isDir(sourceDir)) {
      errors.push(diag("error", "BUILD_DIR_MISSING", `Build directory not found: ${sourceDir}`, { stage: "build" }));
    }
  }

  if (config.index) {
    const indexDir = path.resolve(root, config.index.cwd);
    if (!isDir(indexDir)) {
      errors.push(diag("error", "INDEX_DIR_MISSING", `Index directory not found: ${indexDir}`, { stage: "refresh_index" }));
    }
  }

  const sourceTree = path.resolve(root, config.distribution.source_dir);
  if (!isDir(sourceTree)) {
    errors.push(diag("error", "SOURCE_TREE_MISSING", `Source tree not found: ${sourceTree}`, { stage: "stage" }));
  }

  if (config.publish.mode === "mirror") {
    const mirror = path.resolve(root, config.distribution.mirror_dir);
    if (!isDir(mirror) || !isWorkingCopy(mirror)) {
      errors.push(diag("error", "CHANNEL_NOT_FOUND", `Mirror is not a git working copy: ${mirror}`, { stage: "stage" }));
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors, warnings, exitCode: EXIT.PRECONDITION_FAILED };
  }
  return { ok: true, warnings };
}
