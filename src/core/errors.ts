import type { PipelineStage } from "./stages.js";

export const ERROR_KINDS = [
  "PreconditionFailure",
  "BuildFailure",
  "ArtifactNotFound",
  "ChannelNotFound",
  "IndexFailure",
  "MergeConflict",
  "PushFailure",
  "VcsFailure",
  // thrown but not classified by any stage, e.g. an I/O error
  "UnexpectedFailure"
] as const;

export type ReleaseErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Fatal release failure. Non-fatal conditions (metadata fallback, missing
 * manifest field) are reported as diagnostics instead and never thrown.
 */
export class ReleaseError extends Error {
  readonly kind: ReleaseErrorKind;
  stage?: PipelineStage;
  readonly details?: Record<string, unknown>;

  constructor(kind: ReleaseErrorKind, message: string, opts?: { stage?: PipelineStage; details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ReleaseError";
    this.kind = kind;
    this.stage = opts?.stage;
    this.details = opts?.details;
  }
}

export function isReleaseError(e: unknown): e is ReleaseError {
  return e instanceof ReleaseError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function preconditionFailure(message: string, details?: Record<string, unknown>): ReleaseError {
  return new ReleaseError("PreconditionFailure", message, { details });
}
