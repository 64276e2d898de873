import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import type { PackshipConfig } from "../src/types/config.js";
import { ReleasePipeline } from "../src/core/pipeline.js";
import { ALL_STAGES, stagesFor } from "../src/core/stages.js";
import type { FetchFn } from "../src/version/meta-client.js";
import { FakeVcs, PACK_TOML, cargoRunner, createProject } from "./fakes.js";

const HELLO_SHA = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

function projectConfig(overrides: Partial<PackshipConfig> = {}): PackshipConfig {
  return {
    schema_version: "1.0.0",
    manifest: {
      path: "pack/pack.toml",
      fields: {
        primary_version: "versions.minecraft",
        secondary_version: "versions.fabric",
        artifact_size: "updater.size",
        artifact_hash: "updater.sha256",
        artifact_version: "updater.version",
        artifact_url: "updater.url"
      }
    },
    metadata: { url: "https://meta.example.invalid/{primary}", retries: 1, retry_base_delay_ms: 0 },
    build: {
      command: "cargo",
      args: ["build", "--release"],
      source_dir: "updater",
      output_path: "target/release/updater",
      publish_path: "pack/bin/updater",
      version_source: { path: "updater/Cargo.toml", field: "package.version" },
      download_url: "https://dl.example.invalid/{version}/{file}"
    },
    index: { command: "packwiz", args: ["refresh"], cwd: "pack" },
    distribution: { source_dir: "pack", mirror_dir: "dist" },
    publish: { mode: "mirror", remote: "origin", primary_branch: "main", commit_message: "Update distribution" },
    ...overrides
  };
}

const failingFetch: FetchFn = async () => ({ ok: false, status: 503, json: async () => null });
const loaderFetch: FetchFn = async () => ({
  ok: true,
  status: 200,
  json: async () => [
    { version: "0.17.0-beta.1", stable: false },
    { version: "0.16.9", stable: true }
  ]
});

describe("stage selection", () => {
  it("orders stages for a full release", () => {
    expect(stagesFor({ upgrade: true, build: true, index: true, publish: true })).toEqual([...ALL_STAGES]);
  });

  it("drops what is not selected", () => {
    expect(stagesFor({ upgrade: false, build: true, index: false, publish: true })).toEqual([
      "build",
      "record_artifact",
      "stage",
      "publish"
    ]);
  });
});

describe("release pipeline", () => {
  let root: string;
  const manifest = () => fs.readFileSync(path.join(root, "pack/pack.toml"), "utf8");

  beforeEach(() => {
    root = createProject();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("keeps the current version with one warning when the metadata service fails, and still builds", async () => {
    const runner = cargoRunner();
    const pipeline = new ReleasePipeline(projectConfig(), root, { runner, fetch: failingFetch });
    const result = await pipeline.run({ stages: ["resolve_version", "update_manifest", "build", "record_artifact"] });

    expect(result.success).toBe(true);
    expect(result.version).toEqual({ primary: "1.21.1", secondary: "0.16.5" });
    expect(result.diagnostics.map((d) => d.code)).toEqual(["METADATA_FETCH_FAILED"]);
    expect(runner.invocations.map((i) => i.command)).toEqual(["cargo"]);
    expect(manifest()).toBe(
      PACK_TOML.replace("size = 0", "size = 5")
        .replace('sha256 = ""', `sha256 = "${HELLO_SHA}"`)
        .replace('version = "0.0.0"', 'version = "1.4.0"')
        .replace('url = ""', 'url = "https://dl.example.invalid/1.4.0/updater"')
    );
  });

  it("runs a full mirror release", async () => {
    const vcs = new FakeVcs({ branch: "main", pending: ["pack.toml"] });
    const repos: string[] = [];
    const runner = cargoRunner();
    const pipeline = new ReleasePipeline(projectConfig(), root, {
      runner,
      fetch: loaderFetch,
      vcsFor: (repo) => {
        repos.push(repo);
        return vcs;
      }
    });

    const result = await pipeline.run({ stages: [...ALL_STAGES], primary: "1.21.4" });

    expect(result.success).toBe(true);
    expect(Object.values(result.stages).map((s) => s.status)).toEqual(ALL_STAGES.map(() => "success"));
    expect(result.version).toEqual({ primary: "1.21.4", secondary: "0.16.9" });
    expect(result.artifact).toEqual({ path: path.join(root, "pack/bin/updater"), size: 5, sha256: HELLO_SHA, version: "1.4.0" });
    expect(runner.invocations.map((i) => [i.command, i.cwd])).toEqual([
      ["cargo", path.join(root, "updater")],
      ["packwiz", path.join(root, "pack")]
    ]);
    expect(result.staged?.copied).toEqual(["bin/updater", "index.toml", "pack.toml"]);
    expect(fs.existsSync(path.join(root, "dist/old.txt"))).toBe(false);
    expect(fs.readFileSync(path.join(root, "dist/pack.toml"), "utf8")).toBe(manifest());
    expect(repos).toEqual([path.join(root, "dist")]);
    expect(result.publish).toEqual({ status: "published", branch: "main", commit: "c1", files: 1 });
    expect(result.diagnostics).toEqual([]);
  });

  it("writes both versions and is idempotent on rerun", async () => {
    const pipeline = new ReleasePipeline(projectConfig(), root, { fetch: loaderFetch });
    await pipeline.run({ stages: ["resolve_version", "update_manifest"] });
    const first = manifest();
    expect(first).toBe(PACK_TOML.replace('fabric = "0.16.5"', 'fabric = "0.16.9"'));

    const again = await pipeline.run({ stages: ["resolve_version", "update_manifest"] });
    expect(again.success).toBe(true);
    expect(manifest()).toBe(first);
  });

  it("keeps a bare numeric primary exactly as written when no primary is given", async () => {
    const bare = PACK_TOML.replace('minecraft = "1.21.1"', "minecraft = 1.20");
    fs.writeFileSync(path.join(root, "pack/pack.toml"), bare);

    const result = await new ReleasePipeline(projectConfig(), root, { fetch: loaderFetch }).run({
      stages: ["resolve_version", "update_manifest"]
    });

    expect(result.version).toEqual({ primary: "1.20", secondary: "0.16.9" });
    expect(manifest()).toBe(bare.replace('fabric = "0.16.5"', 'fabric = "0.16.9"'));
  });

  it("keeps a bare numeric primary in a JSON manifest", async () => {
    const text = '{\n  "minecraft": 1.20,\n  "fabric": "0.16.9"\n}\n';
    fs.writeFileSync(path.join(root, "pack/pack.json"), text);
    const config = projectConfig();
    config.manifest = {
      path: "pack/pack.json",
      fields: { ...config.manifest.fields, primary_version: "minecraft", secondary_version: "fabric" }
    };

    const result = await new ReleasePipeline(config, root, { fetch: loaderFetch }).run({
      stages: ["resolve_version", "update_manifest"]
    });

    expect(result.success).toBe(true);
    expect(result.version).toEqual({ primary: "1.20", secondary: "0.16.9" });
    expect(fs.readFileSync(path.join(root, "pack/pack.json"), "utf8")).toBe(text);
  });

  it("stops at the first fatal error and tags its stage", async () => {
    const pipeline = new ReleasePipeline(projectConfig(), root, { runner: cargoRunner(101), fetch: loaderFetch });
    const result = await pipeline.run({ stages: [...ALL_STAGES] });

    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe("BuildFailure");
    expect(result.error?.stage).toBe("build");
    expect(result.stages.build?.status).toBe("failed");
    expect(result.stages.record_artifact).toBeUndefined();
    // the version update that preceded the failure stays written
    expect(manifest()).toContain('fabric = "0.16.9"');
    expect(manifest()).toContain("size = 0");
  });

  it("reports no changes as a successful publish", async () => {
    const pipeline = new ReleasePipeline(projectConfig(), root, { vcsFor: () => new FakeVcs({ branch: "main" }) });
    const result = await pipeline.run({ stages: ["publish"] });
    expect(result.success).toBe(true);
    expect(result.publish).toEqual({ status: "no_changes" });
  });

  it("skips the mirror and promotes the project repository in promotion mode", async () => {
    const vcs = new FakeVcs({ branch: "dev", pending: ["pack/pack.toml"] });
    const repos: string[] = [];
    const config = projectConfig({ publish: { mode: "promotion", remote: "origin", primary_branch: "main" } });
    const pipeline = new ReleasePipeline(config, root, {
      vcsFor: (repo) => {
        repos.push(repo);
        return vcs;
      }
    });

    const result = await pipeline.run({ stages: ["stage", "publish"], commitMessage: "Bump loader" });

    expect(result.stages.stage?.status).toBe("skipped");
    expect(fs.existsSync(path.join(root, "dist/old.txt"))).toBe(true);
    expect(repos).toEqual([root]);
    expect(vcs.calls).toContain("merge dev Merge branch 'dev' into main: Bump loader");
    expect(vcs.branch).toBe("dev");
  });

  it("skips the index stage when no index tool is configured", async () => {
    const pipeline = new ReleasePipeline(projectConfig({ index: undefined }), root, { runner: cargoRunner() });
    const result = await pipeline.run({ stages: ["refresh_index"] });
    expect(result.stages.refresh_index?.status).toBe("skipped");
  });

  it("needs a resolved version before updating the manifest", async () => {
    const result = await new ReleasePipeline(projectConfig(), root).run({ stages: ["update_manifest"] });
    expect(result.error?.kind).toBe("PreconditionFailure");
    expect(result.error?.stage).toBe("update_manifest");
  });

  it("reports an unclassified error as UnexpectedFailure with its error code", async () => {
    const denied = Object.assign(new Error("EACCES: permission denied, open 'dist/.git/index.lock'"), { code: "EACCES" });
    const pipeline = new ReleasePipeline(projectConfig(), root, {
      vcsFor: () => {
        throw denied;
      }
    });

    const result = await pipeline.run({ stages: ["publish"] });

    expect(result.success).toBe(false);
    expect(result.error).toMatchObject({
      kind: "UnexpectedFailure",
      stage: "publish",
      message: "EACCES: permission denied, open 'dist/.git/index.lock'",
      details: { code: "EACCES" }
    });
  });

  it("needs a build section to build", async () => {
    const result = await new ReleasePipeline(projectConfig({ build: undefined }), root).run({ stages: ["build"] });
    expect(result.error?.kind).toBe("PreconditionFailure");
  });
});
