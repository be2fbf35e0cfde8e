#!/usr/bin/env node

import { main } from "./cli/main";
import { color } from "./cli/ui";

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
