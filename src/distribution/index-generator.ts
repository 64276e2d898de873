import fs from "node:fs";
import path from "node:path";
import { execRunner, tail, type CommandRunner } from "../core/command.js";
import { ReleaseError, errorMessage, preconditionFailure } from "../core/errors.js";

export type IndexInput = {
  command: string;
  args?: string[];
  cwd: string;
};

/**
 * Regenerate the package index (e.g. `packwiz refresh`) so the hashes it
 * lists match the files about to be staged.
 */
export async function refreshIndex(input: IndexInput, runner: CommandRunner = execRunner): Promise<void> {
  const cwd = path.resolve(input.cwd);
  if (!fs.existsSync(cwd)) {
    throw preconditionFailure(`Index directory not found: ${cwd}`, { path: cwd });
  }
  const args = input.args ?? [];

  let exitCode: number;
  let stderr: string;
  try {
    ({ exitCode, stderr } = await runner(input.command, args, { cwd }));
  } catch (e) {
    throw new ReleaseError("IndexFailure", `Could not start '${input.command}': ${errorMessage(e)}`, {
      stage: "refresh_index",
      cause: e
    });
  }
  if (exitCode !== 0) {
    throw new ReleaseError("IndexFailure", `'${[input.command, ...args].join(" ")}' exited with code ${exitCode}`, {
      stage: "refresh_index",
      details: { exitCode, stderr: tail(stderr) }
    });
  }
}
