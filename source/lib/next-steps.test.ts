import { describe, it, expect } from "vitest";
import { getNextSteps } from "./next-steps.js";

describe("getNextSteps", () => {
  it("reminds about both variables when neither was given", () => {
    const steps = getNextSteps({ publisherName: "", extensionPath: "" });

    expect(steps.map((s) => s.text)).toEqual([
      "Ensure 'OPEN_VSX_TOKEN' is set in your repository secrets.",
      "Enable 'Allow auto-merge' in your repository settings so sync PRs merge themselves.",
      "Set 'PUBLISHER_NAME' in your repository variables (or use -p flag next time).",
      "Set 'EXTENSION_PATH' in your repository variables (or use -e flag next time).",
      "Review the staged changes and commit them:",
    ]);
  });

  it("omits reminders for values that were given", () => {
    const steps = getNextSteps({ publisherName: "acme", extensionPath: "./pkg/ext" });

    expect(steps).toHaveLength(3);
    expect(steps.some((s) => s.text.includes("PUBLISHER_NAME"))).toBe(false);
    expect(steps.some((s) => s.text.includes("EXTENSION_PATH"))).toBe(false);
  });

  it("only reminds about the missing extension path", () => {
    const steps = getNextSteps({ publisherName: "acme", extensionPath: "" });

    expect(steps[2]?.text).toBe(
      "Set 'EXTENSION_PATH' in your repository variables (or use -e flag next time)."
    );
    expect(steps).toHaveLength(4);
  });

  it("ends with the commit commands", () => {
    const steps = getNextSteps({ publisherName: "acme", extensionPath: "ext" });

    expect(steps[steps.length - 1]).toEqual({
      text: "Review the staged changes and commit them:",
      commands: ["git status", "git commit -m 'chore: configure openvsx release workflows'"],
    });
  });
});
