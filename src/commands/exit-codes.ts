import type { ReleaseErrorKind } from "../core/errors.js";

/**
 * CLI exit codes. "Nothing to publish" is a success.
 */
export const EXIT = {
  SUCCESS: 0,
  RELEASE_FAILED: 1,
  PRECONDITION_FAILED: 2,
  INVALID_ARGS: 3,
  BUILD_FAILED: 4,
  PUBLISH_FAILED: 5
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const EXIT_BY_KIND: Record<ReleaseErrorKind, ExitCode> = {
  PreconditionFailure: EXIT.PRECONDITION_FAILED,
  BuildFailure: EXIT.BUILD_FAILED,
  ArtifactNotFound: EXIT.BUILD_FAILED,
  IndexFailure: EXIT.RELEASE_FAILED,
  ChannelNotFound: EXIT.PUBLISH_FAILED,
  MergeConflict: EXIT.PUBLISH_FAILED,
  PushFailure: EXIT.PUBLISH_FAILED,
  VcsFailure: EXIT.PUBLISH_FAILED,
  UnexpectedFailure: EXIT.RELEASE_FAILED
};

export function exitCodeFor(kind: ReleaseErrorKind): ExitCode {
  return EXIT_BY_KIND[kind];
}
