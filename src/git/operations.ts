import { simpleGit, GitResponseError } from "simple-git";
import { ReleaseError, errorMessage, type ReleaseErrorKind } from "../core/errors.js";

/**
 * Version-control operations the release pipeline needs. Every call runs to
 * completion before the next one starts.
 */
export interface VcsClient {
  /** Paths with pending changes (staged, unstaged or untracked). */
  status(): Promise<string[]>;
  addAll(): Promise<void>;
  /** Returns the new commit's SHA. */
  commit(message: string): Promise<string>;
  push(remote: string, branch: string): Promise<void>;
  checkout(branch: string): Promise<void>;
  merge(branch: string, message: string): Promise<void>;
  abortMerge(): Promise<void>;
  currentBranch(): Promise<string>;
}

/** The slice of simple-git used here; a SimpleGit instance satisfies it. */
export type GitBackend = {
  status(): Promise<{ files: Array<{ path: string }> }>;
  raw(args: string[]): Promise<string>;
  commit(message: string): Promise<{ commit: string }>;
  push(remote: string, branch: string): Promise<unknown>;
  checkout(branch: string): Promise<unknown>;
  merge(args: string[]): Promise<unknown>;
  revparse(args: string[]): Promise<string>;
};

function conflictFiles(result: unknown): string[] {
  if (typeof result !== "object" || result === null || !("conflicts" in result)) return [];
  const { conflicts } = result;
  if (!Array.isArray(conflicts)) return [];
  return conflicts.flatMap((c: unknown) =>
    typeof c === "object" && c !== null && "file" in c && typeof c.file === "string" ? [c.file] : []
  );
}

/**
 * Git operations over simple-git. Maps git failures onto release error kinds.
 */
export class GitOperations implements VcsClient {
  private git: GitBackend;

  constructor(readonly repoPath: string, git?: GitBackend) {
    this.git = git ?? simpleGit(repoPath);
  }

  private async run<T>(op: string, kind: ReleaseErrorKind, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new ReleaseError(kind, `git ${op} failed in ${this.repoPath}: ${errorMessage(e)}`, {
        cause: e,
        details: { op, repo: this.repoPath }
      });
    }
  }

  async status(): Promise<string[]> {
    const res = await this.run("status", "VcsFailure", () => this.git.status());
    return res.files.map((f) => f.path);
  }

  async addAll(): Promise<void> {
    await this.run("add", "VcsFailure", () => this.git.raw(["add", "--all"]));
  }

  async commit(message: string): Promise<string> {
    const res = await this.run("commit", "VcsFailure", () => this.git.commit(message));
    return res.commit;
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.run("push", "PushFailure", () => this.git.push(remote, branch));
  }

  async checkout(branch: string): Promise<void> {
    await this.run("checkout", "VcsFailure", () => this.git.checkout(branch));
  }

  /**
   * A merge that stops on conflicts is a MergeConflict; any other failure
   * (unknown branch, dirty index) leaves no merge in progress and is a VcsFailure.
   */
  async merge(branch: string, message: string): Promise<void> {
    try {
      await this.git.merge(["--no-ff", "-m", message, branch]);
    } catch (e) {
      const conflicts = e instanceof GitResponseError ? conflictFiles(e.git) : [];
      if (conflicts.length === 0) {
        throw new ReleaseError("VcsFailure", `git merge failed in ${this.repoPath}: ${errorMessage(e)}`, {
          cause: e,
          details: { op: "merge", repo: this.repoPath, branch }
        });
      }
      throw new ReleaseError("MergeConflict", `Merge of '${branch}' did not complete: ${errorMessage(e)}`, {
        cause: e,
        details: { branch, conflicts }
      });
    }
  }

  async abortMerge(): Promise<void> {
    await this.run("merge --abort", "VcsFailure", () => this.git.merge(["--abort"]));
  }

  /** Get current branch name. */
  async currentBranch(): Promise<string> {
    const result = await this.run("rev-parse", "VcsFailure", () => this.git.revparse(["--abbrev-ref", "HEAD"]));
    return result.trim();
  }
}
