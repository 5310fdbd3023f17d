/*
Purpose: load and validate the JSON build input (settings, options, resolved requirements).
Assumptions: dependency resolution already happened; requirement texts are fully resolved refs.
Usage: const input = loadBuildInput("build.json"); BuildIdentity.create(toIdentityInput(input)).
*/

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import type { BuildIdentityInput } from "../model/build-identity.js";
import { parseComponentRef, type ComponentRef } from "../model/component-ref.js";
import { OptionsValues } from "../model/options-values.js";
import { SettingsValues } from "../model/settings-values.js";
import { formatSchemaIssues } from "../model/structured.js";

import { MalformedReferenceError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

const ScalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const BuildInputSchema = z
  .object({
    settings: z.record(z.string(), ScalarSchema).default({}),
    options: z.record(z.string(), ScalarSchema).default({}),
    requires: z.array(z.string().min(1)).default([]),
    indirect_requires: z.array(z.string().min(1)).default([]),
    non_dev_requires: z.array(z.string().min(1)).optional(),
    ignored_settings: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type BuildInput = z.infer<typeof BuildInputSchema>;

const CONFIG_HINT = "Check the build input file against the documented format.";

// =============================================================================
// LOADING
// =============================================================================

export function loadBuildInput(filePath: string): BuildInput {
  const resolved = path.resolve(filePath);
  if (!fse.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Build input missing.",
      message: `Build input not found at ${resolved}.`,
      hint: "Pass the path of an existing JSON build input file.",
    });
  }

  let raw: unknown;
  try {
    raw = fse.readJsonSync(resolved);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Build input invalid.",
      message: `Build input at ${resolved} is not valid JSON.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }

  return parseBuildInput(raw, resolved);
}

export function parseBuildInput(raw: unknown, source = "<input>"): BuildInput {
  const parsed = BuildInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Build input invalid.",
      message: [`Build input at ${source} failed validation:`, ...issues.map((i) => `- ${i}`)].join(
        "\n",
      ),
      hint: CONFIG_HINT,
      cause: parsed.error,
    });
  }

  return parsed.data;
}

export function toIdentityInput(input: BuildInput): BuildIdentityInput {
  return {
    settings: SettingsValues.fromRecord(input.settings),
    options: OptionsValues.fromRecord(input.options),
    directRequires: input.requires.map((text) => parseReference(text, "requires")),
    indirectRequires: input.indirect_requires.map((text) =>
      parseReference(text, "indirect_requires"),
    ),
    relevanceFilter: input.non_dev_requires ?? null,
    ignoredSettings: input.ignored_settings,
  };
}

function parseReference(text: string, field: string): ComponentRef {
  try {
    return parseComponentRef(text);
  } catch (err) {
    if (err instanceof MalformedReferenceError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Build input invalid.",
        message: `${field} contains a malformed reference "${text}".`,
        hint: "References look like name/version[@user/channel][:package_id].",
        cause: err,
      });
    }
    throw err;
  }
}
