/*
Purpose: connect build inputs and identity files to the identity model, logging each step.
Assumptions: callers own the logger; a missing logger means no events are written.
Usage: const { identity } = computeIdentity(loadBuildInput(path), { logger }); await writeIdentityFile(out, identity).
*/

import path from "node:path";

import fse from "fs-extra";

import { BuildIdentity } from "../model/build-identity.js";

import { toIdentityInput, type BuildInput } from "./build-input.js";
import { logIdentityEvent, type JsonlLogger } from "./logger.js";

export type IdentityServiceOptions = {
  logger?: JsonlLogger;
};

export type ComputedIdentity = {
  identity: BuildIdentity;
  packageId: string;
};

export type IdentityComparison = {
  equal: boolean;
  packageIds: [string, string];
};

export function computeIdentity(
  input: BuildInput,
  options: IdentityServiceOptions = {},
): ComputedIdentity {
  const identity = BuildIdentity.create(toIdentityInput(input));
  const packageId = identity.packageId();

  logIdentityEvent(options.logger, "identity.computed", {
    package_id: packageId,
    requires: input.requires.length,
    indirect_requires: input.indirect_requires.length,
    filtered: input.non_dev_requires !== undefined,
  });

  return { identity, packageId };
}

export async function writeIdentityFile(
  filePath: string,
  identity: BuildIdentity,
  options: IdentityServiceOptions = {},
): Promise<string> {
  const resolved = path.resolve(filePath);
  await fse.outputFile(resolved, identity.canonicalDump(), "utf8");

  logIdentityEvent(options.logger, "identity.written", {
    path: resolved,
    package_id: identity.packageId(),
  });
  return resolved;
}

export function loadIdentityFile(
  filePath: string,
  options: IdentityServiceOptions = {},
): ComputedIdentity {
  const resolved = path.resolve(filePath);
  const identity = BuildIdentity.loadFromPath(resolved);
  const packageId = identity.packageId();

  logIdentityEvent(options.logger, "identity.loaded", { path: resolved, package_id: packageId });
  return { identity, packageId };
}

export function compareIdentityFiles(
  leftPath: string,
  rightPath: string,
  options: IdentityServiceOptions = {},
): IdentityComparison {
  const left = loadIdentityFile(leftPath, options);
  const right = loadIdentityFile(rightPath, options);
  const equal = left.identity.equals(right.identity);

  logIdentityEvent(options.logger, "identity.compared", {
    left: path.resolve(leftPath),
    right: path.resolve(rightPath),
    equal,
  });

  return { equal, packageIds: [left.packageId, right.packageId] };
}
