import { Command } from "commander";

import { registerCompareCommand } from "./cli/compare.js";
import { registerComputeCommand } from "./cli/compute.js";
import { registerShowCommand } from "./cli/show.js";

export { BuildIdentity, IDENTITY_SECTIONS } from "./model/build-identity.js";
export type { BuildIdentityInput, StructuredIdentity } from "./model/build-identity.js";
export {
  compareComponentRefs,
  formatComponentRef,
  parseComponentRef,
  type ComponentRef,
} from "./model/component-ref.js";
export { OptionsValues } from "./model/options-values.js";
export { RequirementManifest } from "./model/requirement-manifest.js";
export {
  createRequirementRecord,
  requirementFullText,
  requirementIdentityLine,
  type RequirementRecord,
} from "./model/requirement-record.js";
export { RequirementSet, type RelevanceFilter } from "./model/requirement-set.js";
export { Scopes } from "./model/scopes.js";
export { SettingsValues } from "./model/settings-values.js";
export { stabilizeVersion } from "./model/version.js";
export * from "./core/errors.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("pkgid")
    .description("Compute and inspect content-addressable package identities")
    .option("--log <file>", "Append JSONL events to this file (or set PKGID_LOG_FILE)")
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerComputeCommand(program);
  registerShowCommand(program);
  registerCompareCommand(program);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
