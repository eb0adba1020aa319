import { join } from "path";

export const WORKFLOW_DIR = join(".github", "workflows");

export const PUBLISHER_PLACEHOLDER = "${{ vars.PUBLISHER_NAME }}";
export const EXTENSION_PATH_PLACEHOLDER = "${{ vars.EXTENSION_PATH }}";

export type RequiredTool = {
  command: string;
  label: string;
  installUrl: string;
};

/**
 * Tools that must be on PATH before anything is written, checked in order.
 * gh is never invoked here; the installed workflows depend on it.
 */
export const REQUIRED_TOOLS: readonly RequiredTool[] = [
  { command: "git", label: "Git", installUrl: "https://git-scm.com/downloads" },
  { command: "gh", label: "GitHub CLI (gh)", installUrl: "https://cli.github.com/" },
];

/**
 * Resolves the repository root the workflows are installed into.
 * Priority: explicit argument > OVSX_SETUP_ROOT env var > current directory
 */
export function getRepoRoot(explicitRoot?: string): string {
  return explicitRoot || process.env.OVSX_SETUP_ROOT || process.cwd();
}
