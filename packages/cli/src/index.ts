#!/usr/bin/env node

import { runCli } from "./program";

runCli(process.argv).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  }
);
