import type { VersionRecord, VersionSpec } from "../types/manifest.js";
import { preconditionFailure, errorMessage } from "../core/errors.js";
import { diag, type Diagnostic } from "../report/diagnostics.js";

/** Remote "latest versions" lookup, newest first. */
export type VersionLookup = (primary: string) => Promise<VersionRecord[]>;

export type ResolveInput = {
  explicitPrimary?: string;
  current: VersionSpec;
  lookup?: VersionLookup;
};

export type ResolveResult = {
  spec: VersionSpec;
  /** Set when the remote lookup failed and the current secondary was kept. */
  warning?: Diagnostic;
};

/** First stable record, or the first record when none is flagged stable. */
export function pickLatest(records: VersionRecord[]): VersionRecord | undefined {
  return records.find((r) => r.stable === true) ?? records[0];
}

function fallback(current: VersionSpec, primary: string, reason: string): ResolveResult {
  if (current.secondary === "") {
    throw preconditionFailure(`No secondary version recorded and the lookup failed: ${reason}`);
  }
  return {
    spec: { primary, secondary: current.secondary },
    warning: diag(
      "warn",
      "METADATA_FETCH_FAILED",
      `Could not fetch latest secondary version (${reason}); keeping ${current.secondary}`,
      { stage: "resolve_version", details: { fallback: current.secondary } }
    )
  };
}

/**
 * Resolve the target version pair.
 *
 * The primary comes from the explicit override or stays as it is; the
 * secondary is always re-derived from the remote lookup. A failed lookup is
 * never fatal: it degrades to the current secondary plus a warning.
 */
export async function resolveVersion(input: ResolveInput): Promise<ResolveResult> {
  if (input.explicitPrimary !== undefined && input.explicitPrimary.trim() === "") {
    throw preconditionFailure("Explicit primary version must not be empty");
  }
  const primary = input.explicitPrimary?.trim() ?? input.current.primary;
  if (primary === "") {
    throw preconditionFailure("No primary version recorded and none supplied");
  }

  if (!input.lookup) {
    return fallback(input.current, primary, "no metadata endpoint configured");
  }

  let records: VersionRecord[];
  try {
    records = await input.lookup(primary);
  } catch (e) {
    return fallback(input.current, primary, errorMessage(e));
  }

  const latest = pickLatest(records.filter((r) => r.version.trim() !== ""));
  if (!latest) {
    return fallback(input.current, primary, "empty version list");
  }

  return { spec: { primary, secondary: latest.version.trim() } };
}
