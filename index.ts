#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { main } from "./src/index.js";

export * from "./src/index.js";

// Allow `node dist/index.js` and the installed `pkgid` bin (a symlink) to run directly
if (process.argv[1] && fileURLToPath(import.meta.url) === fs.realpathSync(process.argv[1])) {
  void main(process.argv);
}
