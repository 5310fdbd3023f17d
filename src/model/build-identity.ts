// Build identities: the settings, options and requirements behind one package ID.
// Purpose: assemble pruned and full snapshots, reduce them to a memoized package ID, and
// persist them as sectioned text (for files, diffs and equality) or structured data (for JSON).
// Assumes an identity is not mutated once its package ID has been read.

import fse from "fs-extra";
import { z } from "zod";

import { MalformedIdentityFileError, MissingIdentityFileError } from "../core/errors.js";
import { contentHash } from "../core/hash.js";

import type { ComponentRef } from "./component-ref.js";
import { OptionsValues } from "./options-values.js";
import { RequirementManifest, StructuredManifestSchema } from "./requirement-manifest.js";
import { requirementIdentityLine, requirementRecordFromRef } from "./requirement-record.js";
import {
  RequirementSet,
  stripDevMarker,
  StructuredRequirementsSchema,
  type RelevanceFilter,
} from "./requirement-set.js";
import { Scopes } from "./scopes.js";
import { indentBlock, parseSections, requireSection } from "./section-text.js";
import { SettingsValues } from "./settings-values.js";
import { parseStructured, StructuredPairsSchema } from "./structured.js";

// =============================================================================
// TYPES
// =============================================================================

// Section order is part of the file format; never reorder.
export const IDENTITY_SECTIONS = [
  "settings",
  "requires",
  "options",
  "full_settings",
  "full_requires",
  "full_options",
  "scope",
] as const;

export type IdentitySection = (typeof IDENTITY_SECTIONS)[number];

export type BuildIdentityInput = {
  settings: SettingsValues;
  options: OptionsValues;
  directRequires: ComponentRef[];
  indirectRequires: ComponentRef[];
  /** Names of identity-relevant requirements; omitted or `null` means all of them. */
  relevanceFilter?: Iterable<string> | null;
  /** Settings keys (and their dotted children) left out of the pruned snapshot. */
  ignoredSettings?: string[];
};

export const StructuredIdentitySchema = z
  .object({
    settings: StructuredPairsSchema,
    full_settings: StructuredPairsSchema,
    options: StructuredPairsSchema,
    full_options: StructuredPairsSchema,
    requires: StructuredRequirementsSchema,
    full_requires: StructuredManifestSchema,
  })
  .strict();

export type StructuredIdentity = z.infer<typeof StructuredIdentitySchema>;

type BuildIdentityParts = {
  settings: SettingsValues;
  fullSettings: SettingsValues;
  options: OptionsValues;
  fullOptions: OptionsValues;
  requires: RequirementSet;
  fullRequires: RequirementManifest;
  scope: Scopes | null;
};

// =============================================================================
// BUILD IDENTITY
// =============================================================================

export class BuildIdentity {
  readonly settings: SettingsValues;
  readonly fullSettings: SettingsValues;
  readonly options: OptionsValues;
  readonly fullOptions: OptionsValues;
  readonly requires: RequirementSet;
  readonly fullRequires: RequirementManifest;
  readonly scope: Scopes | null;
  readonly relevanceFilter: RelevanceFilter;

  private cachedPackageId: string | null = null;

  private constructor(parts: BuildIdentityParts) {
    this.settings = parts.settings;
    this.fullSettings = parts.fullSettings;
    this.options = parts.options;
    this.fullOptions = parts.fullOptions;
    this.requires = parts.requires;
    this.fullRequires = parts.fullRequires;
    this.scope = parts.scope;
    this.relevanceFilter = parts.requires.relevanceFilter;
  }

  static create(input: BuildIdentityInput): BuildIdentity {
    const options = input.options.copy();
    options.clearIndirect();

    const fullRequires = new RequirementManifest(input.directRequires);
    fullRequires.extend(input.indirectRequires);

    const requires = RequirementSet.create(input.directRequires, input.relevanceFilter ?? null);
    requires.addIndirect(input.indirectRequires);

    return new BuildIdentity({
      settings: input.settings.without(input.ignoredSettings ?? []),
      fullSettings: input.settings,
      options,
      fullOptions: input.options,
      requires,
      fullRequires,
      scope: null,
    });
  }

  /**
   * Rebuilds an identity from its canonical text. The relevance filter is not stored, so it is
   * recovered from DEV markers in [requires] as the names of the unmarked direct requirements,
   * or `null` when there are none. The recomputed package ID matches the created one only when
   * that recovered filter rates every requirement and every dependency option group the same
   * as the original filter did.
   */
  static parse(text: string): BuildIdentity {
    const sections = parseSections(text, IDENTITY_SECTIONS);
    const section = (name: IdentitySection): string => requireSection(sections, name);

    const fullRequires = RequirementManifest.parseText(section("full_requires"));
    const fullOptions = OptionsValues.parse(section("full_options"), "full_options");
    const options = OptionsValues.parse(section("options"), "options");
    options.ensureGroups(fullOptions.packageNames());

    return new BuildIdentity({
      settings: SettingsValues.parse(section("settings"), "settings"),
      fullSettings: SettingsValues.parse(section("full_settings"), "full_settings"),
      options,
      fullOptions,
      requires: rebuildRequirements(section("requires"), fullRequires),
      fullRequires,
      scope: Scopes.parse(section("scope")),
    });
  }

  static fromStructured(data: unknown): BuildIdentity {
    const parsed = parseStructured(StructuredIdentitySchema, data, "identity");
    const fullOptions = OptionsValues.fromStructured(parsed.full_options);
    const options = OptionsValues.fromStructured(parsed.options);
    options.ensureGroups(fullOptions.packageNames());

    return new BuildIdentity({
      settings: SettingsValues.fromStructured(parsed.settings),
      fullSettings: SettingsValues.fromStructured(parsed.full_settings),
      options,
      fullOptions,
      requires: RequirementSet.fromStructured(parsed.requires),
      fullRequires: RequirementManifest.fromStructured(parsed.full_requires),
      scope: null,
    });
  }

  static loadFromPath(filePath: string): BuildIdentity {
    let text: string;
    try {
      text = fse.readFileSync(filePath, "utf8");
    } catch (err) {
      throw new MissingIdentityFileError(filePath, err);
    }
    return BuildIdentity.parse(text);
  }

  /**
   * Hash of the settings, options and requirements hashes, in that order. Reordering the
   * parts changes every existing package ID.
   */
  packageId(): string {
    if (this.cachedPackageId === null) {
      this.cachedPackageId = contentHash(
        [
          this.settings.identityHash(),
          this.options.identityHash(this.relevanceFilter),
          this.requires.identityHash(),
        ].join("\n"),
      );
    }
    return this.cachedPackageId;
  }

  canonicalDump(): string {
    const bodies: Record<IdentitySection, string | null> = {
      settings: this.settings.canonicalDump(),
      requires: this.requires.canonicalDump(),
      options: this.options.canonicalDump(),
      full_settings: this.fullSettings.canonicalDump(),
      full_requires: this.fullRequires.canonicalDump(),
      full_options: this.fullOptions.canonicalDump(),
      scope: this.scope && !this.scope.isEmpty() ? this.scope.canonicalDump() : null,
    };

    const result: string[] = [];
    for (const name of IDENTITY_SECTIONS) {
      result.push(result.length === 0 ? `[${name}]` : `\n[${name}]`);
      const body = bodies[name];
      if (body !== null) {
        result.push(indentBlock(body));
      }
    }
    return result.join("\n");
  }

  /** Textual equality of canonical dumps, not structural equality of the parts. */
  equals(other: BuildIdentity): boolean {
    return this.canonicalDump() === other.canonicalDump();
  }

  /** Scope is not part of the structured form. */
  toStructured(): StructuredIdentity {
    return {
      settings: this.settings.toStructured(),
      full_settings: this.fullSettings.toStructured(),
      options: this.options.toStructured(),
      full_options: this.fullOptions.toStructured(),
      requires: this.requires.toStructured(),
      full_requires: this.fullRequires.toStructured(),
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Direct requirements are the full references whose identity line appears in [requires];
 * everything else in [full_requires] was indirect. DEV markers give back the names that were
 * identity-relevant, though not which indirect names were.
 */
function rebuildRequirements(body: string, fullRequires: RequirementManifest): RequirementSet {
  const pending = body
    .split("\n")
    .filter((line) => line.length > 0)
    .map(stripDevMarker);

  const direct: ComponentRef[] = [];
  const indirect: ComponentRef[] = [];
  const relevant = new Set<string>();
  let sawDev = false;

  for (const ref of fullRequires.sorted()) {
    const line = requirementIdentityLine(requirementRecordFromRef(ref));
    const index = pending.findIndex((candidate) => candidate.line === line);
    if (index < 0) {
      indirect.push(ref);
      continue;
    }

    const [claimed] = pending.splice(index, 1);
    direct.push(ref);
    if (claimed.dev) {
      sawDev = true;
    } else {
      relevant.add(ref.name);
    }
  }

  const [unmatched] = pending;
  if (unmatched) {
    throw new MalformedIdentityFileError(
      "requires",
      `Requirement '${unmatched.line}' has no entry in [full_requires]`,
    );
  }

  const requires = RequirementSet.create(direct, sawDev ? relevant : null);
  requires.addIndirect(indirect);
  return requires;
}
