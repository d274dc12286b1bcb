#!/usr/bin/env tsx

import { createProgram } from "./program.ts";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(
      `api-tree: ${err instanceof Error ? err.message : String(err)}\n`,
    );
    process.exitCode = 1;
  });
