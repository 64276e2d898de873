import { schemaChecker, type SchemaCheck } from "../schema/ajv.js";
import type { PackshipConfig } from "../types/config.js";
import configSchema from "../../schemas/config.schema.json" with { type: "json" };

const checkConfig = schemaChecker<PackshipConfig>(configSchema);

/** Validate a merged config tree against schemas/config.schema.json. */
export function validateConfig(config: unknown): SchemaCheck<PackshipConfig> {
  return checkConfig(config);
}
