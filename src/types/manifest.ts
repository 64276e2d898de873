import type { ManifestFormat } from "./config.js";

/** Release manifest types — the document is kept as text, never as an object graph. */
export type FieldValue = string | number | boolean;

export type ManifestDocument = {
  filePath: string;
  format: ManifestFormat;
  /** Full text, including a leading U+FEFF when the file had one. */
  text: string;
  hasBom: boolean;
};

/** Byte span of a scalar value inside the manifest text. */
export type FieldSpan = {
  path: string;
  start: number;
  end: number;
  raw: string;
};

export type VersionSpec = {
  readonly primary: string;
  readonly secondary: string;
};

export type BuildArtifact = {
  /** Publish-facing location the binary was copied to. */
  path: string;
  size: number;
  sha256: string;
  version: string;
};

export type VersionRecord = {
  version: string;
  stable?: boolean;
};
