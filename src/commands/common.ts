import path from "node:path";
import type { PackshipConfig } from "../types/config.js";
import type { PipelineStage } from "../core/stages.js";
import { ReleaseError, errorMessage, isReleaseError } from "../core/errors.js";
import { ReleasePipeline, type PipelineDeps, type PipelineOptions, type PipelineResult } from "../core/pipeline.js";
import { PromotionError } from "../publish/branch-promotion.js";
import { loadConfig } from "../config/loader.js";
import { diag, type Diagnostic } from "../report/diagnostics.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type CommandOptions = {
  configDir: string;
  env?: string;
  /** Directory the configured paths are relative to (cwd by default). */
  rootDir?: string;
};

export type CommandDeps = PipelineDeps & {
  /** Environment consulted for PACKSHIP_ overrides. */
  environment?: NodeJS.ProcessEnv;
};

export type CommandResult =
  | { ok: true; result: PipelineResult }
  | { ok: false; error: Diagnostic; exitCode: ExitCode; result?: PipelineResult };

/** Error diagnostic for a fatal failure; promotion failures carry their state and transition. */
export function errorDiagnostic(e: ReleaseError): Diagnostic {
  const details: Record<string, unknown> = { ...e.details };
  if (e instanceof PromotionError) {
    details.state = e.state;
    details.transition = e.transition;
    details.remoteAffected = e.remoteAffected;
    details.restored = e.restored;
    if (e.restoreError) details.restoreError = e.restoreError;
  }
  return diag("error", e.kind, e.message, {
    stage: e.stage,
    details: Object.keys(details).length > 0 ? details : undefined
  });
}

export function failure(e: unknown, result?: PipelineResult): CommandResult {
  if (isReleaseError(e)) {
    return { ok: false, error: errorDiagnostic(e), exitCode: exitCodeFor(e.kind), result };
  }
  return { ok: false, error: diag("error", "UNEXPECTED", errorMessage(e)), exitCode: EXIT.RELEASE_FAILED, result };
}

/**
 * Load the layered config and run the stages `select` picks for it.
 */
export async function runStages(
  opts: CommandOptions,
  select: (config: PackshipConfig) => PipelineStage[],
  pipelineOpts: Omit<PipelineOptions, "stages">,
  deps: CommandDeps = {}
): Promise<CommandResult> {
  let config: PackshipConfig;
  try {
    config = loadConfig(opts.env, path.resolve(opts.configDir), deps.environment);
  } catch (e) {
    return failure(e);
  }

  const pipeline = new ReleasePipeline(config, opts.rootDir ?? process.cwd(), deps);
  const result = await pipeline.run({ ...pipelineOpts, stages: select(config) });
  if (!result.success) {
    return failure(result.error, result);
  }
  return { ok: true, result };
}
