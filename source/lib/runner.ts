/**
 * Narrow seam around external tools so the setup procedure can run
 * against a fake in tests.
 */

import { spawn } from "child_process";
import { access, stat } from "fs/promises";
import { constants } from "fs";
import { delimiter, join } from "path";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
};

export interface ToolRunner {
  /**
   * Run a command to completion and capture its output.
   * Rejects only when the process cannot be started.
   */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;

  /**
   * Locate an executable on PATH. Resolves to null when it is not found.
   */
  lookPath(name: string): Promise<string | null>;
}

/**
 * Helper to run a command and capture stdout/stderr.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data) => {
      stderr += data.toString();
    });

    proc.on("error", reject);

    proc.on("close", (code) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
  });
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search the directories of `searchPath` for an executable named `name`.
 * On Windows every PATHEXT extension is tried as well.
 */
export async function lookPath(
  name: string,
  searchPath: string = process.env.PATH ?? "",
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  const extensions =
    platform === "win32"
      ? ["", ...(process.env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";").filter(Boolean)]
      : [""];

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, name + ext);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

export const nodeToolRunner: ToolRunner = {
  run: runCommand,
  lookPath: (name) => lookPath(name),
};
