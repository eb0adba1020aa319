/**
 * Long aliases the option parser cannot express (it takes one short and
 * one long name per option), mapped onto the canonical long flag.
 */
export const LONG_FLAG_ALIASES: Readonly<Record<string, string>> = {
  "--ovsx-publisher": "--publisher",
  "--path": "--extension-path",
  "--dir": "--extension-path",
};

/**
 * Rewrite alias flags in place so the parser sees one option per value.
 * Order is preserved, so the last occurrence of any alias still wins.
 * Arguments after `--` are passed through untouched.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  const result: string[] = [];
  let passthrough = false;

  for (const arg of argv) {
    if (passthrough || !arg.startsWith("--")) {
      result.push(arg);
      continue;
    }

    if (arg === "--") {
      passthrough = true;
      result.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const canonical = LONG_FLAG_ALIASES[flag];

    if (!canonical) {
      result.push(arg);
    } else {
      result.push(eq === -1 ? canonical : canonical + arg.slice(eq));
    }
  }

  return result;
}
