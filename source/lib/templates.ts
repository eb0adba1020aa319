/**
 * Workflow templates shipped with the package.
 */

import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { join } from "path";
import { EXTENSION_PATH_PLACEHOLDER, PUBLISHER_PLACEHOLDER } from "./config.js";

export const WORKFLOW_NAMES = ["sync", "release", "auto-tag", "check-version"] as const;

export type WorkflowName = (typeof WORKFLOW_NAMES)[number];

export type WorkflowTemplate = {
  readonly name: WorkflowName;
  readonly filename: string;
  readonly content: string;
};

export type TemplateSet = readonly WorkflowTemplate[];

export type TemplateParams = {
  publisherName: string;
  extensionPath: string;
};

// Same relative location from source/lib and dist/lib
export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

/**
 * Read every workflow template from `dir`, in WORKFLOW_NAMES order.
 */
export async function loadTemplateSet(dir: string = DEFAULT_TEMPLATES_DIR): Promise<TemplateSet> {
  const templates: WorkflowTemplate[] = [];

  for (const name of WORKFLOW_NAMES) {
    const filename = `${name}.yml`;
    const content = await readFile(join(dir, filename), "utf-8");
    templates.push(Object.freeze({ name, filename, content }));
  }

  return Object.freeze(templates);
}

let templateSet: Promise<TemplateSet> | undefined;

/**
 * Process-wide template set, loaded on first use.
 */
export function getTemplateSet(): Promise<TemplateSet> {
  templateSet ??= loadTemplateSet();
  return templateSet;
}

/**
 * Substitute the publisher and extension path placeholders.
 * An empty value leaves its placeholder for repository variables to fill in.
 */
export function renderTemplate(content: string, params: TemplateParams): string {
  let rendered = content;
  // Replacer functions keep `$&`-style sequences in values literal
  if (params.publisherName) {
    rendered = rendered.replaceAll(PUBLISHER_PLACEHOLDER, () => params.publisherName);
  }
  if (params.extensionPath) {
    rendered = rendered.replaceAll(EXTENSION_PATH_PLACEHOLDER, () => params.extensionPath);
  }
  return rendered;
}
