import { runStages, type CommandDeps, type CommandOptions, type CommandResult } from "./common.js";

/**
 * Resolve the target version pair and write it into the manifest.
 * `primary` overrides the manifest's current primary version.
 */
export function upgrade(opts: CommandOptions & { primary?: string }, deps?: CommandDeps): Promise<CommandResult> {
  return runStages(opts, () => ["resolve_version", "update_manifest"], { primary: opts.primary }, deps);
}
