#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./main.js";

void (async () => {
  process.exitCode = await runCli(hideBin(process.argv));
})();
