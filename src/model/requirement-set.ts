// Requirement sets: the dependency input to a package ID.
// Purpose: hold one record per resolved reference and reduce the identity-relevant ones to a hash.
// Assumes iteration is always in ascending reference order so insertion order never leaks.

import { z } from "zod";

import { AmbiguousRequirementError } from "../core/errors.js";
import { contentHash } from "../core/hash.js";
import {
  compareComponentRefs,
  componentRefKey,
  parseComponentRef,
  type ComponentRef,
} from "./component-ref.js";
import {
  createRequirementRecord,
  requirementFullText,
  requirementIdentityLine,
  requirementRecordFromRef,
  type RequirementRecord,
} from "./requirement-record.js";
import { parseStructured } from "./structured.js";

// =============================================================================
// TYPES
// =============================================================================

/** Names of identity-relevant requirements; `null` means every requirement is relevant. */
export type RelevanceFilter = ReadonlySet<string> | null;

export const StructuredRequirementsSchema = z.record(z.string(), z.string());

export type StructuredRequirements = z.infer<typeof StructuredRequirementsSchema>;

const DEV_MARKER = " DEV";

type Entry = {
  ref: ComponentRef;
  record: RequirementRecord;
};

// =============================================================================
// REQUIREMENT SET
// =============================================================================

export class RequirementSet {
  private readonly entries = new Map<string, Entry>();

  private constructor(public readonly relevanceFilter: RelevanceFilter) {}

  static create(
    directRefs: Iterable<ComponentRef>,
    relevanceFilter: Iterable<string> | null = null,
  ): RequirementSet {
    const set = new RequirementSet(relevanceFilter === null ? null : new Set(relevanceFilter));
    for (const ref of directRefs) {
      set.entries.set(componentRefKey(ref), { ref, record: requirementRecordFromRef(ref) });
    }
    return set;
  }

  static fromStructured(data: unknown): RequirementSet {
    const parsed = parseStructured(StructuredRequirementsSchema, data, "requirements");

    const set = new RequirementSet(null);
    for (const [key, fullText] of Object.entries(parsed)) {
      const ref = parseComponentRef(key);
      set.entries.set(componentRefKey(ref), { ref, record: createRequirementRecord(fullText) });
    }
    return set;
  }

  /** Later calls win: a revisited reference is replaced by its indirect record. */
  addIndirect(indirectRefs: Iterable<ComponentRef>): void {
    for (const ref of indirectRefs) {
      this.entries.set(componentRefKey(ref), {
        ref,
        record: requirementRecordFromRef(ref, { indirect: true }),
      });
    }
  }

  allRefs(): ComponentRef[] {
    return Array.from(this.entries.values(), (entry) => entry.ref);
  }

  get size(): number {
    return this.entries.size;
  }

  lookupByNamePrefix(prefix: string): RequirementRecord {
    const matches = Array.from(this.entries.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();

    const entry = matches.length === 1 ? this.entries.get(matches[0]) : undefined;
    if (!entry) {
      throw new AmbiguousRequirementError(prefix, matches);
    }
    return entry.record;
  }

  isRelevant(ref: ComponentRef): boolean {
    return this.relevanceFilter === null || this.relevanceFilter.has(ref.name);
  }

  identityHash(): string {
    const lines = this.sortedEntries()
      .filter((entry) => this.isRelevant(entry.ref))
      .map((entry) => requirementIdentityLine(entry.record));
    return contentHash(lines.join("\n"));
  }

  canonicalDump(): string {
    const lines: string[] = [];
    for (const entry of this.sortedEntries()) {
      const line = requirementIdentityLine(entry.record);
      if (!line) continue;
      lines.push(this.isRelevant(entry.ref) ? line : `${line}${DEV_MARKER}`);
    }
    return lines.join("\n");
  }

  toStructured(): StructuredRequirements {
    const data: StructuredRequirements = {};
    for (const entry of this.sortedEntries()) {
      data[componentRefKey(entry.ref)] = requirementFullText(entry.record);
    }
    return data;
  }

  private sortedEntries(): Entry[] {
    return Array.from(this.entries.values()).sort((a, b) => compareComponentRefs(a.ref, b.ref));
  }
}

export function stripDevMarker(line: string): { line: string; dev: boolean } {
  return line.endsWith(DEV_MARKER)
    ? { line: line.slice(0, -DEV_MARKER.length), dev: true }
    : { line, dev: false };
}
