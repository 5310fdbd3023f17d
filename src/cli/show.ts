import { Command } from "commander";

import { loadIdentityFile } from "../core/identity-service.js";

import { printJson, runCliAction } from "./output.js";

export function registerShowCommand(program: Command): void {
  program
    .command("show")
    .description("Print the package ID and contents of an identity file")
    .argument("<file>", "Path to an identity file")
    .option("--json", "Print the structured identity as JSON", false)
    .action(async (file: string, opts: { json?: boolean }, command: Command) => {
      await runCliAction(command, (ctx) => {
        const { identity, packageId } = loadIdentityFile(file, { logger: ctx.logger });

        if (opts.json) {
          printJson({ package_id: packageId, info: identity.toStructured() });
          return;
        }

        console.log(`Package ID: ${packageId}`);
        console.log("");
        console.log(identity.canonicalDump());
      });
    });
}
