#!/usr/bin/env node

import { runCli } from "../src/cli.js";
import { createOc } from "../src/tools/oc.js";
import { NC, RED } from "../src/tools/log.js";

process.on("SIGINT", () => {
  console.error(`\n${RED}[ERROR]${NC} Operation aborted by user`);
  process.exit(130);
});

runCli(process.argv.slice(2), { oc: createOc(process.env.OC_BIN || "oc"), env: process.env })
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
