import type { PipelineStage } from "../core/stages.js";
import { runStages, type CommandDeps, type CommandOptions, type CommandResult } from "./common.js";

/** Refresh the index (when configured) and mirror the distribution tree. */
export function stageDistribution(opts: CommandOptions & { skipIndex?: boolean }, deps?: CommandDeps): Promise<CommandResult> {
  return runStages(
    opts,
    (config): PipelineStage[] => (config.index && !opts.skipIndex ? ["refresh_index", "stage"] : ["stage"]),
    {},
    deps
  );
}
