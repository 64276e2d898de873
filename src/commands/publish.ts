import { runStages, type CommandDeps, type CommandOptions, type CommandResult } from "./common.js";

export type PublishCommandOptions = CommandOptions & {
  message?: string;
  direct?: boolean;
};

/** Commit and push what was staged, by mirror push or branch promotion. */
export function publish(opts: PublishCommandOptions, deps?: CommandDeps): Promise<CommandResult> {
  return runStages(opts, () => ["publish"], { commitMessage: opts.message, direct: opts.direct }, deps);
}
