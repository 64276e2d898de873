import type { VcsClient } from "../git/operations.js";
import { ReleaseError, errorMessage, isReleaseError, type ReleaseErrorKind } from "../core/errors.js";
import { diag, type Reporter } from "../report/diagnostics.js";
import {
  nextPromotionState,
  remoteAffected,
  transitionName,
  type PromotionState,
  type PromotionTransition
} from "./promotion-state.js";

export type PromotionOptions = {
  /** Operator-supplied commit message. */
  message: string;
  primaryBranch: string;
  remote: string;
  /** Commit and push the current branch as-is: no switch, no merge. */
  direct?: boolean;
};

export type PromotionStep = {
  transition: PromotionTransition;
  status: "ok" | "skipped" | "failed";
  detail?: string;
};

export type PromotionResult = {
  state: PromotionState;
  workingBranch: string;
  pushedBranch: string;
  commit: string | null;
  steps: PromotionStep[];
};

/**
 * Failure of the promotion sequence. `state` is the last state reached and
 * `transition` the one that failed, which tells the operator whether the
 * remote already received the change.
 */
export class PromotionError extends ReleaseError {
  readonly state: PromotionState;
  readonly transition: PromotionTransition;
  readonly remoteAffected: boolean;
  restored: boolean;
  restoreError?: string;

  constructor(kind: ReleaseErrorKind, message: string, opts: { state: PromotionState; transition: PromotionTransition; cause?: unknown; details?: Record<string, unknown> }) {
    super(kind, `${kind} at ${opts.transition}: ${message}`, { stage: "publish", cause: opts.cause, details: opts.details });
    this.name = "PromotionError";
    this.state = opts.state;
    this.transition = opts.transition;
    this.remoteAffected = remoteAffected(opts.state);
    this.restored = false;
  }
}

export function mergeMessage(workingBranch: string, primaryBranch: string, message: string): string {
  return `Merge branch '${workingBranch}' into ${primaryBranch}: ${message}`;
}

/**
 * Branch promotion: commit on the working branch, merge it into the primary
 * branch, push, and switch back. Switching back is attempted on every exit
 * path; it cannot undo a merge or push that already happened.
 */
export class BranchPromotionWorkflow {
  constructor(
    private readonly vcs: VcsClient,
    private readonly report: Reporter = () => {}
  ) {}

  async run(opts: PromotionOptions): Promise<PromotionResult> {
    const direct = opts.direct ?? false;
    let workingBranch: string;
    try {
      workingBranch = await this.vcs.currentBranch();
    } catch (e) {
      throw this.wrap(e, "clean", transitionName("clean", "committed"));
    }

    if (!direct && workingBranch === opts.primaryBranch) {
      throw new PromotionError("PreconditionFailure", `Already on '${opts.primaryBranch}'; use a direct publish instead`, {
        state: "clean",
        transition: transitionName("clean", "committed")
      });
    }

    const steps: PromotionStep[] = [];
    let state: PromotionState = "clean";
    let commit: string | null = null;
    let failure: PromotionError | null = null;

    let next = nextPromotionState(state, direct);
    while (next !== null && next !== "restored") {
      const transition = transitionName(state, next);
      try {
        const outcome = await this.advance(next, { ...opts, direct }, workingBranch);
        if (outcome.commit) commit = outcome.commit;
        steps.push({ transition, status: outcome.skipped ? "skipped" : "ok", detail: outcome.detail });
        this.report(diag("info", "PROMOTION_STEP", `${transition} ${outcome.skipped ? "skipped" : "ok"}`, { stage: "publish" }));
      } catch (e) {
        failure = this.wrap(e, state, transition);
        steps.push({ transition, status: "failed", detail: errorMessage(e) });
        break;
      }
      state = next;
      next = nextPromotionState(state, direct);
    }

    if (!direct) {
      const restore = await this.restore(workingBranch, failure);
      if (failure) {
        failure.restored = restore.ok;
        failure.restoreError = restore.error;
      } else if (restore.ok) {
        steps.push({ transition: transitionName(state, "restored"), status: "ok" });
        state = "restored";
      } else {
        failure = new PromotionError("VcsFailure", `could not switch back to '${workingBranch}': ${restore.error ?? "unknown error"}`, {
          state,
          transition: transitionName(state, "restored")
        });
      }
    }

    if (failure) throw failure;

    return {
      state,
      workingBranch,
      pushedBranch: direct ? workingBranch : opts.primaryBranch,
      commit,
      steps
    };
  }

  private async advance(
    target: PromotionState,
    opts: PromotionOptions & { direct: boolean },
    workingBranch: string
  ): Promise<{ skipped?: boolean; commit?: string; detail?: string }> {
    switch (target) {
      case "committed": {
        const changed = await this.vcs.status();
        if (changed.length === 0) return { skipped: true, detail: "working tree clean" };
        await this.vcs.addAll();
        const commit = await this.vcs.commit(opts.message);
        return { commit, detail: `${changed.length} path(s)` };
      }
      case "merged":
        await this.vcs.checkout(opts.primaryBranch);
        await this.vcs.merge(workingBranch, mergeMessage(workingBranch, opts.primaryBranch, opts.message));
        return {};
      case "pushed": {
        const branch = opts.direct ? workingBranch : opts.primaryBranch;
        await this.vcs.push(opts.remote, branch);
        return { detail: `${opts.remote}/${branch}` };
      }
      default:
        return {};
    }
  }

  /**
   * Best effort: abort a conflicted merge, then check the working branch out
   * again if we are no longer on it. Never throws.
   */
  private async restore(workingBranch: string, failure: PromotionError | null): Promise<{ ok: boolean; error?: string }> {
    if (failure?.kind === "MergeConflict") {
      try {
        await this.vcs.abortMerge();
      } catch (e) {
        this.report(diag("warn", "MERGE_ABORT_FAILED", errorMessage(e), { stage: "publish" }));
      }
    }

    let current: string | null = null;
    try {
      current = await this.vcs.currentBranch();
    } catch (e) {
      this.report(diag("warn", "BRANCH_UNKNOWN", errorMessage(e), { stage: "publish" }));
    }
    if (current === workingBranch) return { ok: true };

    try {
      await this.vcs.checkout(workingBranch);
      return { ok: true };
    } catch (e) {
      const error = errorMessage(e);
      this.report(
        diag("error", "RESTORE_FAILED", `Could not switch back to '${workingBranch}': ${error}`, { stage: "publish" })
      );
      return { ok: false, error };
    }
  }

  private wrap(e: unknown, state: PromotionState, transition: PromotionTransition): PromotionError {
    if (e instanceof PromotionError) return e;
    const kind: ReleaseErrorKind = isReleaseError(e) ? e.kind : "VcsFailure";
    const details = isReleaseError(e) ? e.details : undefined;
    return new PromotionError(kind, errorMessage(e), { state, transition, cause: e, details });
  }
}
