#!/usr/bin/env node
import Pastel from "pastel";
import { readFileSync } from "fs";
import { z } from "zod";
import { normalizeArgv } from "./lib/args.js";

// Resolved beside the package, not the fork the tool runs in
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const app = new Pastel({
  importMeta: import.meta,
  name: "ovsx-setup",
  version: packageJson.version,
});

await app.run(normalizeArgv(process.argv));
