import type { TemplateParams } from "./templates.js";

export type NextStep = {
  text: string;
  commands?: string[];
};

export const COMMIT_MESSAGE = "chore: configure openvsx release workflows";

/**
 * Follow-up the operator has to do by hand after setup.
 * Variable reminders only appear for values that were not baked in.
 */
export function getNextSteps(params: TemplateParams): NextStep[] {
  const steps: NextStep[] = [
    { text: "Ensure 'OPEN_VSX_TOKEN' is set in your repository secrets." },
    { text: "Enable 'Allow auto-merge' in your repository settings so sync PRs merge themselves." },
  ];

  if (!params.publisherName) {
    steps.push({
      text: "Set 'PUBLISHER_NAME' in your repository variables (or use -p flag next time).",
    });
  }

  if (!params.extensionPath) {
    steps.push({
      text: "Set 'EXTENSION_PATH' in your repository variables (or use -e flag next time).",
    });
  }

  steps.push({
    text: "Review the staged changes and commit them:",
    commands: ["git status", `git commit -m '${COMMIT_MESSAGE}'`],
  });

  return steps;
}
