import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { validateProject } from "../src/commands/validate.js";
import { upgrade } from "../src/commands/upgrade.js";
import { build } from "../src/commands/build.js";
import { stageDistribution } from "../src/commands/stage.js";
import { publish } from "../src/commands/publish.js";
import { release } from "../src/commands/release.js";
import { errorDiagnostic } from "../src/commands/common.js";
import { ReleaseError } from "../src/core/errors.js";
import { PromotionError } from "../src/publish/branch-promotion.js";
import { FakeVcs, cargoRunner, createProject, fakeRunner, writeFile } from "./fakes.js";

const BASE_YAML = `schema_version: "1.0.0"
manifest:
  path: pack/pack.toml
  fields:
    primary_version: versions.minecraft
    secondary_version: versions.fabric
    artifact_size: updater.size
    artifact_hash: updater.sha256
    artifact_version: updater.version
build:
  command: cargo
  args: [build, --release]
  source_dir: updater
  output_path: target/release/updater
  publish_path: pack/bin/updater
  version_source:
    path: updater/Cargo.toml
    field: package.version
index:
  command: packwiz
  args: [refresh]
  cwd: pack
distribution:
  source_dir: pack
  mirror_dir: dist
publish:
  mode: mirror
  remote: origin
  primary_branch: main
`;

const lookup = async () => [{ version: "0.16.9", stable: true }];

describe("exit codes", () => {
  it("defines all exit codes", () => {
    expect(EXIT).toEqual({
      SUCCESS: 0,
      RELEASE_FAILED: 1,
      PRECONDITION_FAILED: 2,
      INVALID_ARGS: 3,
      BUILD_FAILED: 4,
      PUBLISH_FAILED: 5
    });
  });

  it("maps error kinds to exit codes", () => {
    expect(exitCodeFor("PreconditionFailure")).toBe(EXIT.PRECONDITION_FAILED);
    expect(exitCodeFor("ArtifactNotFound")).toBe(EXIT.BUILD_FAILED);
    expect(exitCodeFor("IndexFailure")).toBe(EXIT.RELEASE_FAILED);
    expect(exitCodeFor("MergeConflict")).toBe(EXIT.PUBLISH_FAILED);
    expect(exitCodeFor("UnexpectedFailure")).toBe(EXIT.RELEASE_FAILED);
  });

  it("reports promotion state and transition with the error", () => {
    const err = new PromotionError("PushFailure", "rejected", { state: "merged", transition: "merged→pushed" });
    err.restored = true;
    expect(errorDiagnostic(err)).toEqual({
      level: "error",
      code: "PushFailure",
      message: "PushFailure at merged→pushed: rejected",
      stage: "publish",
      details: { state: "merged", transition: "merged→pushed", remoteAffected: false, restored: true }
    });
    expect(errorDiagnostic(new ReleaseError("BuildFailure", "boom"))).toEqual({
      level: "error",
      code: "BuildFailure",
      message: "boom",
      stage: undefined,
      details: undefined
    });
  });
});

describe("commands", () => {
  let root: string;
  let configDir: string;

  beforeEach(() => {
    root = createProject();
    configDir = path.join(root, "config");
    writeFile(configDir, "base.yaml", BASE_YAML);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("validates a complete project", () => {
    expect(validateProject({ configDir, rootDir: root }, {})).toEqual({ ok: true, warnings: [] });
  });

  it("reports missing files and fields", () => {
    fs.rmSync(path.join(root, "dist/.git"), { recursive: true });
    fs.writeFileSync(path.join(root, "pack/pack.toml"), '[versions]\nminecraft = "1.21.1"\n');

    const res = validateProject({ configDir, rootDir: root }, {});
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(EXIT.PRECONDITION_FAILED);
      expect(res.errors.map((e) => e.code)).toEqual(["CHANNEL_NOT_FOUND"]);
      expect(res.warnings.map((w) => w.details?.field)).toEqual([
        "versions.fabric",
        "updater.size",
        "updater.sha256",
        "updater.version"
      ]);
    }
  });

  it("fails validation when the config directory is missing", () => {
    const res = validateProject({ configDir: path.join(root, "nope"), rootDir: root }, {});
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("CONFIG_DIR_MISSING");
  });

  it("upgrades the manifest", async () => {
    const res = await upgrade({ configDir, rootDir: root, primary: "1.21.4" }, { lookup, environment: {} });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.result.version).toEqual({ primary: "1.21.4", secondary: "0.16.9" });
    expect(fs.readFileSync(path.join(root, "pack/pack.toml"), "utf8")).toContain('minecraft = "1.21.4"');
  });

  it("returns BUILD_FAILED for a failing toolchain", async () => {
    const res = await build({ configDir, rootDir: root }, { runner: cargoRunner(101), environment: {} });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(EXIT.BUILD_FAILED);
      expect(res.error.code).toBe("BuildFailure");
      expect(res.error.stage).toBe("build");
    }
  });

  it("builds with an explicit artifact version", async () => {
    const res = await build({ configDir, rootDir: root, artifactVersion: "9.9.9" }, { runner: cargoRunner(), environment: {} });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.result.artifact?.version).toBe("9.9.9");
  });

  it("stages without the index tool when asked", async () => {
    const runner = fakeRunner();
    const res = await stageDistribution({ configDir, rootDir: root, skipIndex: true }, { runner, environment: {} });
    expect(res.ok).toBe(true);
    expect(runner.invocations).toEqual([]);
    expect(fs.existsSync(path.join(root, "dist/pack/pack.toml"))).toBe(false);
    expect(fs.existsSync(path.join(root, "dist/pack.toml"))).toBe(true);
  });

  it("reports a merge conflict with its transition and exit code", async () => {
    const vcs = new FakeVcs({ branch: "dev", pending: ["pack/pack.toml"] });
    vcs.failOn.merge = new ReleaseError("MergeConflict", "CONFLICT (content): pack/pack.toml");

    const res = await publish(
      { configDir, rootDir: root, message: "Update loader" },
      { vcsFor: () => vcs, environment: { PACKSHIP_PUBLISH__MODE: "promotion" } }
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(EXIT.PUBLISH_FAILED);
      expect(res.error.code).toBe("MergeConflict");
      expect(res.error.details).toMatchObject({ state: "committed", transition: "committed→merged", restored: true });
    }
    expect(vcs.calls.slice(-3)).toEqual(["abortMerge", "currentBranch", "checkout dev"]);
  });

  it("runs a release that has nothing to publish", async () => {
    const vcs = new FakeVcs({ branch: "main" });
    const res = await release(
      { configDir, rootDir: root },
      { lookup, runner: cargoRunner(), vcsFor: () => vcs, environment: {} }
    );
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(Object.keys(res.result.stages)).toEqual([
        "resolve_version",
        "update_manifest",
        "build",
        "record_artifact",
        "refresh_index",
        "stage",
        "publish"
      ]);
      expect(res.result.publish).toEqual({ status: "no_changes" });
    }
  });

  it("returns PRECONDITION_FAILED for an invalid config", async () => {
    const res = await upgrade({ configDir, rootDir: root }, { environment: { PACKSHIP_PUBLISH__MODE: "sideways" } });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.exitCode).toBe(EXIT.PRECONDITION_FAILED);
  });
});
