/**
 * Installs the sync and release workflows into a forked extension repository.
 *
 * Every step is a hard stop. Nothing is rolled back: files written before a
 * failure stay on disk and the tool is meant to be re-run once the cause is
 * fixed. Re-running with the same parameters rewrites identical files.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { REQUIRED_TOOLS, WORKFLOW_DIR } from "./config.js";
import { gitAdd, isGitRepository } from "./git.js";
import { getNextSteps, type NextStep } from "./next-steps.js";
import { nodeToolRunner, type ToolRunner } from "./runner.js";
import {
  getTemplateSet,
  renderTemplate,
  type TemplateParams,
  type TemplateSet,
  type WorkflowName,
} from "./templates.js";

export type SetupParams = TemplateParams;

export type SetupOptions = SetupParams & {
  repoRoot: string;
  runner?: ToolRunner;
  templates?: TemplateSet;
  onEvent?: (event: SetupEvent) => void;
};

export type SetupEvent =
  | { type: "publisher_from_flag"; value: string }
  | { type: "extension_path_from_flag"; value: string }
  | { type: "installing"; directory: string }
  | { type: "created"; path: string }
  | { type: "staged"; path: string };

export type SetupErrorKind =
  | "tool_not_found"
  | "not_a_repository"
  | "directory_create_failed"
  | "file_write_failed"
  | "stage_failed";

export type InstalledWorkflow = {
  name: WorkflowName;
  path: string;
};

export type SetupResult =
  | { success: true; installed: InstalledWorkflow[]; nextSteps: NextStep[] }
  | { success: false; error: SetupErrorKind; message: string; hint?: string[] };

export async function runSetup(options: SetupOptions): Promise<SetupResult> {
  const { publisherName, extensionPath, repoRoot } = options;
  const runner = options.runner ?? nodeToolRunner;
  const emit: (event: SetupEvent) => void = options.onEvent ?? (() => {});

  for (const tool of REQUIRED_TOOLS) {
    const found = await runner.lookPath(tool.command);
    if (!found) {
      return {
        success: false,
        error: "tool_not_found",
        message: `${tool.command} not installed`,
        hint: [`${tool.label} is not installed.`, `Please install it: ${tool.installUrl}`],
      };
    }
  }

  if (!(await isGitRepository(repoRoot))) {
    return {
      success: false,
      error: "not_a_repository",
      message: "not a git repo",
      hint: [
        "This does not look like a git repository.",
        "Please run this command from the root of your forked extension.",
      ],
    };
  }

  if (publisherName) {
    emit({ type: "publisher_from_flag", value: publisherName });
  }
  if (extensionPath) {
    emit({ type: "extension_path_from_flag", value: extensionPath });
  }

  const templates = options.templates ?? (await getTemplateSet());

  emit({ type: "installing", directory: WORKFLOW_DIR });
  try {
    await mkdir(join(repoRoot, WORKFLOW_DIR), { recursive: true });
  } catch (err) {
    return {
      success: false,
      error: "directory_create_failed",
      message: `error creating workflow directory ${WORKFLOW_DIR}: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const installed: InstalledWorkflow[] = [];

  for (const template of templates) {
    const content = renderTemplate(template.content, { publisherName, extensionPath });
    const destPath = join(WORKFLOW_DIR, template.filename);

    try {
      await writeFile(join(repoRoot, destPath), content, { mode: 0o644 });
    } catch (err) {
      return {
        success: false,
        error: "file_write_failed",
        message: `error writing file ${destPath}: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
    emit({ type: "created", path: destPath });

    const staged = await gitAdd(runner, repoRoot, destPath);
    if (!staged.success) {
      return {
        success: false,
        error: "stage_failed",
        message: `failed to git add ${destPath}: ${staged.message}`,
      };
    }
    emit({ type: "staged", path: destPath });

    installed.push({ name: template.name, path: destPath });
  }

  return {
    success: true,
    installed,
    nextSteps: getNextSteps({ publisherName, extensionPath }),
  };
}
