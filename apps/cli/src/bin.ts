#!/usr/bin/env node

import { hideBin } from "yargs/helpers";
import { main, reportError } from "./cli.js";

main(hideBin(process.argv)).catch((error: unknown) => {
  process.exit(reportError(error));
});
