#!/usr/bin/env tsx
/**
 * blogsync CLI
 */

import { createRequire } from "node:module";
import { z } from "zod";
import { createProgram } from "./program.js";

const require = createRequire(import.meta.url);
const pkg = z
  .object({ version: z.string() })
  .parse(require("../package.json"));

createProgram(pkg.version)
  .parseAsync()
  .catch((err: unknown) => {
    console.error("blogsync failed:", err);
    process.exit(1);
  });
