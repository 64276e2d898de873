import type { PublishMode } from "../types/config.js";
import { GitOperations, type VcsClient } from "../git/operations.js";
import { isReleaseError, ReleaseError, errorMessage } from "../core/errors.js";
import type { Reporter } from "../report/diagnostics.js";
import { BranchPromotionWorkflow, type PromotionResult } from "./branch-promotion.js";

export type PublishRequest = {
  mode: PublishMode;
  /** Mirror working copy that was just staged. */
  stagedRoot: string;
  /** Repository promoted in promotion mode. */
  repoRoot: string;
  commitMessage: string;
  remote: string;
  /** Branch pushed in mirror mode (the mirror's checked-out branch when omitted). */
  mirrorBranch?: string;
  /** Target of the merge in promotion mode. */
  primaryBranch: string;
  /** Promotion mode only: commit and push the current branch without merging. */
  direct?: boolean;
};

export type PublishResult =
  | { status: "no_changes" }
  | {
      status: "published";
      branch: string;
      commit: string | null;
      files?: number;
      promotion?: PromotionResult;
    };

export type VcsFactory = (repoPath: string) => VcsClient;

export const gitFactory: VcsFactory = (repoPath) => new GitOperations(repoPath);

function asPublishError(e: unknown, op: string): ReleaseError {
  if (isReleaseError(e)) {
    e.stage ??= "publish";
    return e;
  }
  return new ReleaseError("VcsFailure", `${op}: ${errorMessage(e)}`, { stage: "publish", cause: e });
}

/**
 * Publish coordinator. Decides whether there is anything to publish and
 * pushes it either straight from the mirror or through branch promotion.
 */
export class PublishCoordinator {
  constructor(
    private readonly vcsFor: VcsFactory = gitFactory,
    private readonly report: Reporter = () => {}
  ) {}

  async publish(req: PublishRequest): Promise<PublishResult> {
    if (req.mode === "promotion") {
      const promotion = await new BranchPromotionWorkflow(this.vcsFor(req.repoRoot), this.report).run({
        message: req.commitMessage,
        primaryBranch: req.primaryBranch,
        remote: req.remote,
        direct: req.direct
      });
      return { status: "published", branch: promotion.pushedBranch, commit: promotion.commit, promotion };
    }
    return this.publishMirror(req);
  }

  /**
   * Direct mirror: nothing pending means nothing to do; no commit, no push.
   * A rejected push leaves the local commit in place.
   */
  private async publishMirror(req: PublishRequest): Promise<PublishResult> {
    const vcs = this.vcsFor(req.stagedRoot);
    let branch: string;
    let commit: string;
    let changed: string[];
    try {
      changed = await vcs.status();
      if (changed.length === 0) return { status: "no_changes" };
      branch = req.mirrorBranch ?? (await vcs.currentBranch());
      await vcs.addAll();
      commit = await vcs.commit(req.commitMessage);
    } catch (e) {
      throw asPublishError(e, "mirror commit");
    }

    try {
      await vcs.push(req.remote, branch);
    } catch (e) {
      const err = asPublishError(e, "mirror push");
      throw new ReleaseError("PushFailure", `${err.message} (local commit ${commit} kept)`, {
        stage: "publish",
        cause: e,
        details: { commit, branch, remote: req.remote }
      });
    }
    return { status: "published", branch, commit, files: changed.length };
  }
}
