import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getRepoRoot, REQUIRED_TOOLS, WORKFLOW_DIR } from "./config.js";
import { join } from "path";

describe("getRepoRoot", () => {
  const originalEnv = process.env.OVSX_SETUP_ROOT;

  beforeEach(() => {
    delete process.env.OVSX_SETUP_ROOT;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.OVSX_SETUP_ROOT = originalEnv;
    } else {
      delete process.env.OVSX_SETUP_ROOT;
    }
  });

  it("returns explicit argument when provided", () => {
    process.env.OVSX_SETUP_ROOT = "/env/repo";
    expect(getRepoRoot("/explicit/repo")).toBe("/explicit/repo");
  });

  it("returns env var when no explicit argument", () => {
    process.env.OVSX_SETUP_ROOT = "/env/repo";
    expect(getRepoRoot()).toBe("/env/repo");
  });

  it("returns the current directory by default", () => {
    expect(getRepoRoot()).toBe(process.cwd());
  });

  it("ignores empty string explicit argument", () => {
    process.env.OVSX_SETUP_ROOT = "/env/repo";
    expect(getRepoRoot("")).toBe("/env/repo");
  });

  it("ignores empty string env var", () => {
    process.env.OVSX_SETUP_ROOT = "";
    expect(getRepoRoot()).toBe(process.cwd());
  });
});

describe("constants", () => {
  it("installs into .github/workflows", () => {
    expect(WORKFLOW_DIR).toBe(join(".github", "workflows"));
  });

  it("checks git before gh", () => {
    expect(REQUIRED_TOOLS.map((t) => t.command)).toEqual(["git", "gh"]);
  });
});
