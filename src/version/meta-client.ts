import type { MetadataConfig } from "../types/config.js";
import type { VersionRecord } from "../types/manifest.js";
import { schemaChecker } from "../schema/ajv.js";
import { withRetry } from "../core/retry.js";
import type { VersionLookup } from "./resolver.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 3_000;

/** Accepts the loader listing shape: `[{ version, stable, ... }]`. */
const VERSION_LIST_SCHEMA = {
  type: "array",
  items: {
    type: "object",
    required: ["version"],
    properties: {
      version: { type: "string" },
      stable: { type: "boolean" }
    }
  }
};

const checkVersionList = schemaChecker<VersionRecord[]>(VERSION_LIST_SCHEMA);

export type FetchFn = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export function expandMetadataUrl(template: string, primary: string): string {
  return template.replace(/\{primary\}/g, encodeURIComponent(primary));
}

/**
 * Build a lookup against the version metadata endpoint. Each attempt is
 * bounded by `timeout_ms`; failed attempts back off exponentially.
 */
export function createMetaLookup(
  config: MetadataConfig,
  deps?: { fetch?: FetchFn; onRetry?: (attempt: number, delayMs: number, error: unknown) => void }
): VersionLookup {
  const doFetch: FetchFn = deps?.fetch ?? ((url, init) => fetch(url, init));
  const timeoutMs = config.timeout_ms ?? DEFAULT_TIMEOUT_MS;

  return (primary: string) => {
    const url = expandMetadataUrl(config.url, primary);
    return withRetry(
      `GET ${url}`,
      {
        attempts: config.retries ?? DEFAULT_RETRIES,
        baseDelayMs: config.retry_base_delay_ms ?? DEFAULT_RETRY_BASE_DELAY_MS,
        onRetry: deps?.onRetry
      },
      async () => {
        const res = await doFetch(url, {
          signal: AbortSignal.timeout(timeoutMs),
          headers: { accept: "application/json" }
        });
        if (!res.ok) {
          throw new Error(`HTTP ${res.status}`);
        }
        const checked = checkVersionList(await res.json());
        if (!checked.valid) {
          throw new Error(`Unexpected metadata response: ${checked.errors}`);
        }
        return checked.value;
      }
    );
  };
}
