import { runStages, type CommandDeps, type CommandOptions, type CommandResult } from "./common.js";

/** Build the artifact and record its size, hash and version in the manifest. */
export function build(opts: CommandOptions & { artifactVersion?: string }, deps?: CommandDeps): Promise<CommandResult> {
  return runStages(opts, () => ["build", "record_artifact"], { artifactVersion: opts.artifactVersion }, deps);
}
