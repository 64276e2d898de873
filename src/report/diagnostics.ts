import type { PipelineStage } from "../core/stages.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  stage?: PipelineStage;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "stage" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

export type Reporter = (d: Diagnostic) => void;

/**
 * Reporter writing one JSON object per line (jsonl) or a plain line (human).
 * Warnings and errors go to stderr in human mode.
 */
export function createReporter(format: OutputFormat): Reporter {
  if (format === "jsonl") {
    return (d) => {
      process.stdout.write(JSON.stringify(d) + "\n");
    };
  }
  return (d) => {
    const prefix = d.stage ? `[${d.stage}] ` : "";
    if (d.level === "info") {
      console.log(`${prefix}${d.message}`);
    } else {
      console.error(`${d.level.toUpperCase()} ${d.code}: ${prefix}${d.message}`);
    }
  };
}

/** Reporter that keeps everything in memory. */
export function collectingReporter(): { report: Reporter; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  return { report: (d) => diagnostics.push(d), diagnostics };
}
