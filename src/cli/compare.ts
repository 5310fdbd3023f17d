import { Command } from "commander";

import { compareIdentityFiles } from "../core/identity-service.js";

import { runCliAction } from "./output.js";

export function registerCompareCommand(program: Command): void {
  program
    .command("compare")
    .description("Compare two identity files by their canonical text (exit code 1 when different)")
    .argument("<left>", "First identity file")
    .argument("<right>", "Second identity file")
    .action(async (left: string, right: string, _opts: unknown, command: Command) => {
      await runCliAction(command, (ctx) => {
        const result = compareIdentityFiles(left, right, { logger: ctx.logger });

        console.log(result.equal ? "equal" : "different");
        console.log(`  ${result.packageIds[0]}  ${left}`);
        console.log(`  ${result.packageIds[1]}  ${right}`);
        if (!result.equal) {
          process.exitCode = 1;
        }
      });
    });
}
