import { Command } from "commander";

import { loadBuildInput } from "../core/build-input.js";
import { computeIdentity, writeIdentityFile } from "../core/identity-service.js";

import { printJson, runCliAction } from "./output.js";

type ComputeOptions = {
  out?: string;
  json?: boolean;
};

export function registerComputeCommand(program: Command): void {
  program
    .command("compute")
    .description("Compute the package ID for a JSON build input")
    .argument("<input>", "Path to the build input JSON file")
    .option("--out <file>", "Write the identity file (canonical text) to this path")
    .option("--json", "Print the package ID and structured identity as JSON", false)
    .action(async (input: string, opts: ComputeOptions, command: Command) => {
      await runCliAction(command, async (ctx) => {
        const { identity, packageId } = computeIdentity(loadBuildInput(input), {
          logger: ctx.logger,
        });
        const written = opts.out
          ? await writeIdentityFile(opts.out, identity, { logger: ctx.logger })
          : null;

        if (opts.json) {
          printJson({ package_id: packageId, path: written, info: identity.toStructured() });
          return;
        }

        console.log(packageId);
        if (written) {
          console.log(`Identity written to ${written}`);
        }
      });
    });
}
