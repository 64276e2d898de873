import { stagesFor } from "../core/stages.js";
import { runStages, type CommandDeps, type CommandOptions, type CommandResult } from "./common.js";

export type ReleaseCommandOptions = CommandOptions & {
  primary?: string;
  artifactVersion?: string;
  message?: string;
  direct?: boolean;
  skipUpgrade?: boolean;
  skipBuild?: boolean;
};

/**
 * Full release: upgrade, build (when a build is configured), refresh the
 * index (when configured), stage and publish.
 */
export function release(opts: ReleaseCommandOptions, deps?: CommandDeps): Promise<CommandResult> {
  return runStages(
    opts,
    (config) =>
      stagesFor({
        upgrade: !opts.skipUpgrade,
        build: config.build !== undefined && !opts.skipBuild,
        index: config.index !== undefined,
        publish: true
      }),
    {
      primary: opts.primary,
      artifactVersion: opts.artifactVersion,
      commitMessage: opts.message,
      direct: opts.direct
    },
    deps
  );
}
