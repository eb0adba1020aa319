/**
 * Git helpers used by setup.
 */

import { stat } from "fs/promises";
import { join } from "path";
import type { CommandResult, ToolRunner } from "./runner.js";

/**
 * A repository root has a `.git` entry. It is a directory for a normal
 * clone and a file for worktrees and submodules, so either counts.
 */
export async function isGitRepository(root: string): Promise<boolean> {
  try {
    await stat(join(root, ".git"));
    return true;
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw err;
  }
}

export type GitAddResult =
  | { success: true }
  | { success: false; message: string };

/**
 * Stage a single path with `git add`, run from the repository root.
 */
export async function gitAdd(
  runner: ToolRunner,
  root: string,
  path: string
): Promise<GitAddResult> {
  let result: CommandResult;
  try {
    result = await runner.run("git", ["add", path], { cwd: root });
  } catch (err) {
    return {
      success: false,
      message: err instanceof Error ? err.message : String(err),
    };
  }

  if (result.exitCode !== 0) {
    return {
      success: false,
      message: result.stderr.trim() || `git exited with code ${result.exitCode}`,
    };
  }

  return { success: true };
}
