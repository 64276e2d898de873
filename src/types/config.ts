/** Configuration types — layered config system (base.yaml ← env.yaml ← PACKSHIP_ vars). */
export type ManifestFormat = "json" | "toml";

export type PublishMode = "mirror" | "promotion";

export type ManifestFieldMap = {
  primary_version: string;
  secondary_version: string;
  artifact_size: string;
  artifact_hash: string;
  artifact_version: string;
  artifact_url?: string;
};

export type ManifestConfig = {
  path: string;
  format?: ManifestFormat;
  fields: ManifestFieldMap;
};

export type MetadataConfig = {
  /** Endpoint listing secondary versions; `{primary}` is substituted. */
  url: string;
  timeout_ms?: number;
  retries?: number;
  retry_base_delay_ms?: number;
};

export type VersionSourceConfig = {
  path: string;
  field: string;
};

export type BuildConfig = {
  command: string;
  args?: string[];
  source_dir: string;
  output_path: string;
  publish_path: string;
  version_source?: VersionSourceConfig;
  /** Download URL template written next to the hash; `{version}` is substituted. */
  download_url?: string;
};

export type IndexConfig = {
  command: string;
  args?: string[];
  cwd: string;
};

export type DistributionConfig = {
  source_dir: string;
  mirror_dir: string;
  exclude?: string[];
};

export type PublishConfig = {
  mode: PublishMode;
  remote: string;
  primary_branch: string;
  mirror_branch?: string;
  commit_message?: string;
};

export type PackshipConfig = {
  schema_version: string;
  manifest: ManifestConfig;
  metadata?: MetadataConfig;
  build?: BuildConfig;
  index?: IndexConfig;
  distribution: DistributionConfig;
  publish: PublishConfig;
};
