import path from "node:path";
import type { PackshipConfig } from "../types/config.js";
import type { BuildArtifact, ManifestDocument, VersionSpec } from "../types/manifest.js";
import { type PipelineStage, orderStages } from "./stages.js";
import { ReleaseError, errorMessage, isReleaseError, preconditionFailure } from "./errors.js";
import { execRunner, type CommandRunner } from "./command.js";
import { diag, type Diagnostic, type Reporter } from "../report/diagnostics.js";
import { loadManifest, readFieldText, saveManifest, updateFields } from "../manifest/store.js";
import { resolveVersion, type VersionLookup } from "../version/resolver.js";
import { createMetaLookup, type FetchFn } from "../version/meta-client.js";
import { ArtifactBuilder, recordArtifact } from "../artifact/builder.js";
import { refreshIndex } from "../distribution/index-generator.js";
import { stage, type StageSummary } from "../distribution/stager.js";
import { PublishCoordinator, gitFactory, type PublishResult, type VcsFactory } from "../publish/coordinator.js";

export const DEFAULT_COMMIT_MESSAGE = "Update distribution";

export type StageResult = {
  status: "success" | "skipped" | "failed";
  duration_ms: number;
  error?: string;
};

export type PipelineOptions = {
  stages: PipelineStage[];
  /** Explicit primary version; the manifest's current primary otherwise. */
  primary?: string;
  /** Explicit artifact version; the configured version source otherwise. */
  artifactVersion?: string;
  commitMessage?: string;
  /** Promotion mode: commit and push the current branch without merging. */
  direct?: boolean;
};

export type PipelineDeps = {
  runner?: CommandRunner;
  fetch?: FetchFn;
  lookup?: VersionLookup;
  vcsFor?: VcsFactory;
  report?: Reporter;
};

export type PipelineResult = {
  success: boolean;
  stages: Partial<Record<PipelineStage, StageResult>>;
  version?: VersionSpec;
  artifact?: BuildArtifact;
  staged?: StageSummary;
  publish?: PublishResult;
  /** Warnings and notes raised along the way; the fatal error is kept separately. */
  diagnostics: Diagnostic[];
  error?: ReleaseError;
};

type RunState = {
  version?: VersionSpec;
  artifact?: BuildArtifact;
  staged?: StageSummary;
  publish?: PublishResult;
};

function toReleaseError(e: unknown, stageName: PipelineStage): ReleaseError {
  if (isReleaseError(e)) {
    e.stage ??= stageName;
    return e;
  }
  const code = e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
  return new ReleaseError("UnexpectedFailure", errorMessage(e), {
    stage: stageName,
    cause: e,
    details: code ? { code } : undefined
  });
}

/**
 * Release pipeline — runs the selected stages in order, each to completion,
 * and stops at the first fatal error. Non-fatal conditions are collected as
 * diagnostics. Nothing is persisted between runs; a rerun starts over and is
 * idempotent because every manifest write is a targeted field update.
 */
export class ReleasePipeline {
  private readonly rootDir: string;
  private readonly runner: CommandRunner;
  private readonly vcsFor: VcsFactory;
  private readonly report: Reporter;

  constructor(
    private readonly config: PackshipConfig,
    rootDir: string,
    private readonly deps: PipelineDeps = {}
  ) {
    this.rootDir = path.resolve(rootDir);
    this.runner = deps.runner ?? execRunner;
    this.vcsFor = deps.vcsFor ?? gitFactory;
    this.report = deps.report ?? (() => {});
  }

  async run(opts: PipelineOptions): Promise<PipelineResult> {
    const stages = orderStages(opts.stages);
    const results: PipelineResult["stages"] = {};
    const diagnostics: Diagnostic[] = [];
    const state: RunState = {};

    const note = (d: Diagnostic) => {
      if (d.level !== "info") diagnostics.push(d);
      this.report(d);
    };

    for (const stageName of stages) {
      const started = Date.now();
      try {
        const outcome = await this.runStage(stageName, opts, state, note);
        results[stageName] = { status: outcome, duration_ms: Date.now() - started };
        note(diag("info", outcome === "skipped" ? "STAGE_SKIPPED" : "STAGE_DONE", `${stageName} ${outcome}`, { stage: stageName }));
      } catch (e) {
        const error = toReleaseError(e, stageName);
        results[stageName] = { status: "failed", duration_ms: Date.now() - started, error: error.message };
        return { success: false, stages: results, ...state, diagnostics, error };
      }
    }

    return { success: true, stages: results, ...state, diagnostics };
  }

  private resolvePath(p: string): string {
    return path.resolve(this.rootDir, p);
  }

  private manifest(): ManifestDocument {
    return loadManifest(this.resolvePath(this.config.manifest.path), this.config.manifest.format);
  }

  private async runStage(
    stageName: PipelineStage,
    opts: PipelineOptions,
    state: RunState,
    note: Reporter
  ): Promise<"success" | "skipped"> {
    switch (stageName) {
      case "resolve_version": {
        const doc = this.manifest();
        const { fields } = this.config.manifest;
        const current: VersionSpec = {
          primary: readFieldText(doc, fields.primary_version) ?? "",
          secondary: readFieldText(doc, fields.secondary_version) ?? ""
        };
        const { spec, warning } = await resolveVersion({
          explicitPrimary: opts.primary,
          current,
          lookup: this.lookup(note)
        });
        if (warning) note(warning);
        state.version = spec;
        return "success";
      }

      case "update_manifest": {
        if (!state.version) throw preconditionFailure("No resolved version to write");
        const { fields } = this.config.manifest;
        const { document, changed, warnings } = updateFields(this.manifest(), [
          [fields.primary_version, state.version.primary],
          [fields.secondary_version, state.version.secondary]
        ]);
        for (const w of warnings) note({ ...w, stage: stageName });
        if (changed.length > 0) saveManifest(document);
        return "success";
      }

      case "build": {
        const build = this.config.build;
        if (!build) throw preconditionFailure("No build section configured");
        state.artifact = await new ArtifactBuilder(this.runner).build({
          sourceDir: this.resolvePath(build.source_dir),
          command: build.command,
          args: build.args,
          outputPath: build.output_path,
          publishPath: this.resolvePath(build.publish_path),
          version: opts.artifactVersion,
          versionSource: build.version_source
            ? { path: this.resolvePath(build.version_source.path), field: build.version_source.field }
            : undefined
        });
        return "success";
      }

      case "record_artifact": {
        if (!state.artifact) throw preconditionFailure("No built artifact to record");
        const { document, changed, warnings } = recordArtifact(
          this.manifest(),
          state.artifact,
          this.config.manifest.fields,
          this.config.build?.download_url
        );
        for (const w of warnings) note({ ...w, stage: stageName });
        if (changed.length > 0) saveManifest(document);
        return "success";
      }

      case "refresh_index": {
        const index = this.config.index;
        if (!index) return "skipped";
        await refreshIndex({ command: index.command, args: index.args, cwd: this.resolvePath(index.cwd) }, this.runner);
        return "success";
      }

      case "stage": {
        if (this.config.publish.mode !== "mirror") return "skipped";
        const dist = this.config.distribution;
        state.staged = stage({
          sourceTree: this.resolvePath(dist.source_dir),
          destinationRoot: this.resolvePath(dist.mirror_dir),
          exclude: dist.exclude
        });
        return "success";
      }

      case "publish": {
        const publish = this.config.publish;
        const result = await new PublishCoordinator(this.vcsFor, note).publish({
          mode: publish.mode,
          stagedRoot: this.resolvePath(this.config.distribution.mirror_dir),
          repoRoot: this.rootDir,
          commitMessage: opts.commitMessage ?? publish.commit_message ?? DEFAULT_COMMIT_MESSAGE,
          remote: publish.remote,
          mirrorBranch: publish.mirror_branch,
          primaryBranch: publish.primary_branch,
          direct: opts.direct
        });
        if (result.status === "no_changes") {
          note(diag("info", "NO_CHANGES", "Nothing to publish", { stage: stageName }));
        }
        state.publish = result;
        return "success";
      }
    }
  }

  private lookup(note: Reporter): VersionLookup | undefined {
    if (this.deps.lookup) return this.deps.lookup;
    if (!this.config.metadata) return undefined;
    return createMetaLookup(this.config.metadata, {
      fetch: this.deps.fetch,
      onRetry: (attempt, delayMs, error) =>
        note(
          diag("info", "METADATA_RETRY", `Attempt ${attempt} failed (${errorMessage(error)}); retrying in ${delayMs}ms`, {
            stage: "resolve_version"
          })
        )
    });
  }
}
