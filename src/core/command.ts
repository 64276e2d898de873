import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export const MAX_CMD_BUFFER_SIZE = 50 * 1024 * 1024; // 50MB

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/** Runs an external tool to completion. Non-zero exits resolve, they do not throw. */
export type CommandRunner = (command: string, args: string[], opts: { cwd: string }) => Promise<CommandResult>;

function hasExitCode(e: unknown): e is { code: number | string; stdout?: unknown; stderr?: unknown } {
  return typeof e === "object" && e !== null && "code" in e;
}

export const execRunner: CommandRunner = async (command, args, opts) => {
  try {
    const { stdout, stderr } = await pExecFile(command, args, {
      cwd: opts.cwd,
      maxBuffer: MAX_CMD_BUFFER_SIZE,
      shell: false
    });
    return { exitCode: 0, stdout, stderr };
  } catch (e) {
    // spawn failures (ENOENT…) carry a string code and no exit status
    if (hasExitCode(e) && typeof e.code === "number") {
      return {
        exitCode: e.code,
        stdout: typeof e.stdout === "string" ? e.stdout : "",
        stderr: typeof e.stderr === "string" ? e.stderr : ""
      };
    }
    throw e;
  }
};

/** Last `n` non-empty lines of tool output, for error details. */
export function tail(output: string, n = 20): string {
  return output
    .split(/\r?\n/)
    .filter((l) => l.trim().length > 0)
    .slice(-n)
    .join("\n");
}
