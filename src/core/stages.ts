/**
 * All pipeline stages in execution order.
 */
export const ALL_STAGES = [
  "resolve_version",
  "update_manifest",
  "build",
  "record_artifact",
  "refresh_index",
  "stage",
  "publish"
] as const;

export type PipelineStage = (typeof ALL_STAGES)[number];

/**
 * Order a stage selection by pipeline position, dropping duplicates.
 */
export function orderStages(selected: Iterable<PipelineStage>): PipelineStage[] {
  const wanted = new Set(selected);
  return ALL_STAGES.filter((s) => wanted.has(s));
}

/**
 * Stage selection for the common entry points.
 * `upgrade` only touches the manifest; `release` runs everything available.
 */
export function stagesFor(opts: {
  upgrade: boolean;
  build: boolean;
  index: boolean;
  publish: boolean;
}): PipelineStage[] {
  const stages: PipelineStage[] = [];
  if (opts.upgrade) stages.push("resolve_version", "update_manifest");
  if (opts.build) stages.push("build", "record_artifact");
  if (opts.publish) {
    if (opts.index) stages.push("refresh_index");
    stages.push("stage", "publish");
  }
  return orderStages(stages);
}
