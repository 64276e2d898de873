import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { computeSha256FromContent, digestFile } from "../src/artifact/checksum.js";
import { ArtifactBuilder, declaredVersion, expandDownloadUrl, recordArtifact } from "../src/artifact/builder.js";
import { parseManifest, readField } from "../src/manifest/store.js";
import { ReleaseError } from "../src/core/errors.js";
import { fakeRunner, makeTmpDir, writeFile } from "./fakes.js";

// sha256("hello")
const HELLO_SHA = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

describe("checksum", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("hashes content deterministically", () => {
    expect(computeSha256FromContent("hello")).toBe(HELLO_SHA);
    expect(computeSha256FromContent(Buffer.from("hello"))).toBe(HELLO_SHA);
  });

  it("hashes and measures files from the same bytes", () => {
    const file = writeFile(dir, "bin/updater", "hello");
    expect(digestFile(file)).toEqual({ size: 5, sha256: HELLO_SHA });
    expect(digestFile(file)).toEqual(digestFile(file));
  });
});

describe("artifact builder", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir();
    fs.mkdirSync(path.join(dir, "updater"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const input = () => ({
    sourceDir: path.join(dir, "updater"),
    command: "cargo",
    args: ["build", "--release"],
    outputPath: "target/release/updater",
    publishPath: path.join(dir, "pack/bin/updater"),
    version: "1.4.0"
  });

  it("runs the toolchain, copies the binary and hashes it", async () => {
    const runner = fakeRunner({}, (_cmd, _args, cwd) => writeFile(cwd, "target/release/updater", "hello"));
    const artifact = await new ArtifactBuilder(runner).build(input());

    expect(runner.invocations).toEqual([{ command: "cargo", args: ["build", "--release"], cwd: path.join(dir, "updater") }]);
    expect(artifact).toEqual({ path: path.join(dir, "pack/bin/updater"), size: 5, sha256: HELLO_SHA, version: "1.4.0" });
    expect(fs.readFileSync(path.join(dir, "pack/bin/updater"), "utf8")).toBe("hello");
  });

  it("fails with BuildFailure on a non-zero exit", async () => {
    const runner = fakeRunner({ exitCode: 101, stderr: "error[E0425]: cannot find value\n\nerror: aborting\n" });
    const err = await new ArtifactBuilder(runner).build(input()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ReleaseError);
    if (err instanceof ReleaseError) {
      expect(err.kind).toBe("BuildFailure");
      expect(err.stage).toBe("build");
      expect(err.message).toBe("'cargo build --release' exited with code 101");
      expect(err.details).toEqual({ exitCode: 101, stderr: "error[E0425]: cannot find value\nerror: aborting" });
    }
    expect(fs.existsSync(path.join(dir, "pack/bin/updater"))).toBe(false);
  });

  it("fails with BuildFailure when the toolchain cannot start", async () => {
    const runner = async () => {
      throw new Error("spawn cargo ENOENT");
    };
    await expect(new ArtifactBuilder(runner).build(input())).rejects.toMatchObject({ kind: "BuildFailure" });
  });

  it("fails with ArtifactNotFound when the build leaves no output", async () => {
    const err = await new ArtifactBuilder(fakeRunner()).build(input()).catch((e: unknown) => e);
    expect(err).toMatchObject({ kind: "ArtifactNotFound", stage: "build" });
  });

  it("requires the source directory", async () => {
    const runner = fakeRunner();
    const err = await new ArtifactBuilder(runner)
      .build({ ...input(), sourceDir: path.join(dir, "missing") })
      .catch((e: unknown) => e);
    expect(err).toMatchObject({ kind: "PreconditionFailure" });
    expect(runner.invocations).toHaveLength(0);
  });

  it("reads the declared version from the toolchain manifest", () => {
    const cargo = writeFile(dir, "updater/Cargo.toml", '[package]\nname = "updater"\nversion = "2.0.1"\n');
    expect(declaredVersion({ versionSource: { path: cargo, field: "package.version" } })).toBe("2.0.1");
    expect(declaredVersion({ version: "3.0.0", versionSource: { path: cargo, field: "package.version" } })).toBe("3.0.0");
    expect(() => declaredVersion({ versionSource: { path: cargo, field: "package.edition" } })).toThrow(ReleaseError);
    expect(() => declaredVersion({})).toThrow("No artifact version given and no version source configured");
  });
});

describe("recording artifact metadata", () => {
  const fields = {
    primary_version: "versions.minecraft",
    secondary_version: "versions.fabric",
    artifact_size: "updater.size",
    artifact_hash: "updater.sha256",
    artifact_version: "updater.version",
    artifact_url: "updater.url"
  };
  const artifact = { path: "/work/pack/bin/updater", size: 5, sha256: HELLO_SHA, version: "1.4.0" };

  it("expands the download URL template", () => {
    expect(expandDownloadUrl("https://dl.example.invalid/{version}/{file}?h={sha256}", artifact)).toBe(
      `https://dl.example.invalid/1.4.0/updater?h=${HELLO_SHA}`
    );
  });

  it("writes size, hash, version and URL through field updates", () => {
    const doc = parseManifest(
      "pack.toml",
      '[updater]\nsize = 0\nsha256 = ""\nversion = "0.0.0"\nurl = ""\n'
    );
    const { document, changed, warnings } = recordArtifact(doc, artifact, fields, "https://dl.example.invalid/{version}");
    expect(changed).toEqual(["updater.size", "updater.sha256", "updater.version", "updater.url"]);
    expect(warnings).toEqual([]);
    expect(document.text).toBe(
      `[updater]\nsize = 5\nsha256 = "${HELLO_SHA}"\nversion = "1.4.0"\nurl = "https://dl.example.invalid/1.4.0"\n`
    );
    expect(readField(document, "updater.size")).toBe(5);
  });

  it("warns about fields the manifest does not have", () => {
    const doc = parseManifest("pack.toml", "[updater]\nsize = 5\n");
    const { changed, warnings } = recordArtifact(doc, artifact, fields);
    expect(changed).toEqual([]);
    expect(warnings.map((w) => w.code)).toEqual(["FIELD_NOT_FOUND", "FIELD_NOT_FOUND"]);
  });
});
