import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { PackshipConfig } from "../types/config.js";
import { preconditionFailure } from "../core/errors.js";
import { validateConfig } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "PACKSHIP_";

type ConfigTree = Record<string, unknown>;

function isTree(v: unknown): v is ConfigTree {
  return v !== undefined && v !== null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isTree(val) && isTree(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw preconditionFailure(`Config file is not a mapping: ${filePath}`, { path: filePath });
  }
  return parsed;
}

/**
 * Apply PACKSHIP_ prefixed environment variable overrides.
 * `__` separates nesting levels: PACKSHIP_PUBLISH__MODE → publish.mode.
 * Values are read as YAML scalars, so numbers and booleans keep their type.
 */
export function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let leaf: unknown = YAML.parse(value);
    for (const segment of [...segments].reverse()) {
      leaf = { [segment]: leaf };
    }
    if (isTree(leaf)) result = deepMerge(result, leaf);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables, then
 * validate it.
 *
 * @param envName - Optional environment name; loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): PackshipConfig {
  const dir = configDir ?? CONFIG_DIR;
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw preconditionFailure(`Config directory not found: ${dir}`, { path: dir });
  }

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  merged = applyEnvOverrides(merged, env);

  const checked = validateConfig(merged);
  if (!checked.valid) {
    throw preconditionFailure(`Invalid config in ${dir}: ${checked.errors}`, { path: dir });
  }
  return checked.value;
}
