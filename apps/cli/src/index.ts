#!/usr/bin/env node

import { WirecallError } from "@wirecall/core";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof WirecallError) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
