#!/usr/bin/env node

import { Command, Option } from "commander";
import type { PipelineResult } from "./core/pipeline.js";
import { createReporter, diag, type OutputFormat, type Reporter } from "./report/diagnostics.js";
import type { CommandOptions, CommandResult } from "./commands/common.js";
import { validateProject } from "./commands/validate.js";
import { upgrade } from "./commands/upgrade.js";
import { build } from "./commands/build.js";
import { stageDistribution } from "./commands/stage.js";
import { publish } from "./commands/publish.js";
import { release } from "./commands/release.js";
import { EXIT } from "./commands/exit-codes.js";

type GlobalOpts = { config: string; env?: string; root?: string; format: OutputFormat };

const program = new Command();

program
  .name("packship")
  .description("Version bump, artifact build and distribution publishing for a release manifest")
  .version("0.1.0");

// usage errors exit with INVALID_ARGS; set before subcommands so they inherit it
program.exitOverride((err) => {
  process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
});

function withCommon(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory", "config")
    .option("--env <name>", "Config layer to apply over base.yaml")
    .option("--root <path>", "Directory configured paths are relative to (default: cwd)")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

function commandOptions(opts: GlobalOpts): CommandOptions {
  return { configDir: opts.config, env: opts.env, rootDir: opts.root };
}

function summarize(result: PipelineResult): string {
  const parts: string[] = [];
  if (result.version) parts.push(`version ${result.version.primary} / ${result.version.secondary}`);
  if (result.artifact) parts.push(`artifact ${result.artifact.version} (${result.artifact.size} bytes, sha256 ${result.artifact.sha256})`);
  if (result.staged) parts.push(`staged ${result.staged.copied.length} file(s)`);
  if (result.publish) {
    parts.push(result.publish.status === "no_changes" ? "nothing to publish" : `published ${result.publish.branch}`);
  }
  return parts.length > 0 ? parts.join("; ") : "OK";
}

function finish(res: CommandResult, report: Reporter): void {
  if (!res.ok) {
    report(res.error);
    process.exit(res.exitCode);
  }
  report(
    diag("info", "OK", summarize(res.result), {
      details: {
        stages: res.result.stages,
        version: res.result.version,
        artifact: res.result.artifact,
        publish: res.result.publish
      }
    })
  );
}

withCommon(program.command("validate"))
  .description("Validate config and the files it points at")
  .action((opts: GlobalOpts) => {
    const report = createReporter(opts.format);
    const res = validateProject(commandOptions(opts));
    for (const w of res.warnings) report(w);
    if (!res.ok) {
      for (const err of res.errors) report(err);
      process.exit(res.exitCode);
    }
    report(diag("info", "OK", "OK"));
  });

withCommon(program.command("upgrade"))
  .description("Resolve the latest version pair and write it into the manifest")
  .option("--primary <version>", "Primary version to move to (default: keep the manifest's)")
  .action(async (opts: GlobalOpts & { primary?: string }) => {
    const report = createReporter(opts.format);
    finish(await upgrade({ ...commandOptions(opts), primary: opts.primary }, { report }), report);
  });

withCommon(program.command("build"))
  .description("Build the artifact and record its size, hash and version")
  .option("--artifact-version <version>", "Declared artifact version (default: read from the version source)")
  .action(async (opts: GlobalOpts & { artifactVersion?: string }) => {
    const report = createReporter(opts.format);
    finish(await build({ ...commandOptions(opts), artifactVersion: opts.artifactVersion }, { report }), report);
  });

withCommon(program.command("stage"))
  .description("Refresh the index and mirror the distribution tree")
  .option("--skip-index", "Do not run the index generator")
  .action(async (opts: GlobalOpts & { skipIndex?: boolean }) => {
    const report = createReporter(opts.format);
    finish(await stageDistribution({ ...commandOptions(opts), skipIndex: opts.skipIndex }, { report }), report);
  });

withCommon(program.command("publish"))
  .description("Commit and push staged changes (mirror push or branch promotion)")
  .option("-m, --message <text>", "Commit message")
  .option("--direct", "Promotion mode: push the current branch without merging")
  .action(async (opts: GlobalOpts & { message?: string; direct?: boolean }) => {
    const report = createReporter(opts.format);
    finish(await publish({ ...commandOptions(opts), message: opts.message, direct: opts.direct }, { report }), report);
  });

withCommon(program.command("release"))
  .description("Run the whole pipeline: upgrade, build, index, stage, publish")
  .option("--primary <version>", "Primary version to move to")
  .option("--artifact-version <version>", "Declared artifact version")
  .option("-m, --message <text>", "Commit message")
  .option("--direct", "Promotion mode: push the current branch without merging")
  .option("--skip-upgrade", "Keep the manifest's version pair")
  .option("--skip-build", "Do not rebuild the artifact")
  .action(
    async (
      opts: GlobalOpts & {
        primary?: string;
        artifactVersion?: string;
        message?: string;
        direct?: boolean;
        skipUpgrade?: boolean;
        skipBuild?: boolean;
      }
    ) => {
      const report = createReporter(opts.format);
      const res = await release(
        {
          ...commandOptions(opts),
          primary: opts.primary,
          artifactVersion: opts.artifactVersion,
          message: opts.message,
          direct: opts.direct,
          skipUpgrade: opts.skipUpgrade,
          skipBuild: opts.skipBuild
        },
        { report }
      );
      finish(res, report);
    }
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.RELEASE_FAILED);
});
