// Build options snapshot.
// Purpose: hold the package's own options (`shared=True`) and options inherited from
// dependencies (`Boost:shared=False`), and hash them under a relevance filter.
// Assumes option names never contain `:` or `=`.

import { contentHash } from "../core/hash.js";

import type { RelevanceFilter } from "./requirement-set.js";
import { formatKeyValueLines, parseKeyValueLines } from "./section-text.js";
import { parseStructured, StructuredPairsSchema, type StructuredPairs } from "./structured.js";
import { compareText } from "./version.js";

const UNSET_VALUES = new Set(["", "None"]);
const PACKAGE_SEPARATOR = ":";

type OptionGroup = Map<string, string>;

export class OptionsValues {
  private readonly own: OptionGroup = new Map();
  private readonly inherited = new Map<string, OptionGroup>();

  constructor(values: Iterable<readonly [string, string]> = []) {
    for (const [rawKey, rawValue] of values) {
      this.set(rawKey.trim(), rawValue.trim());
    }
  }

  static fromRecord(record: Record<string, string>): OptionsValues {
    return new OptionsValues(Object.entries(record));
  }

  static parse(text: string, section = "options"): OptionsValues {
    return new OptionsValues(parseKeyValueLines(text, section));
  }

  static fromStructured(data: unknown): OptionsValues {
    return new OptionsValues(parseStructured(StructuredPairsSchema, data, "options"));
  }

  copy(): OptionsValues {
    const copied = new OptionsValues(this.entries());
    copied.ensureGroups(this.inherited.keys());
    return copied;
  }

  /**
   * Empties every dependency's option group in place. The groups stay, so each relevant
   * dependency still adds an (empty) group hash to `identityHash`.
   */
  clearIndirect(): void {
    for (const group of this.inherited.values()) {
      group.clear();
    }
  }

  /** Adds an empty group for each dependency that has none; text dumps never show empty groups. */
  ensureGroups(packageNames: Iterable<string>): void {
    for (const packageName of packageNames) {
      if (!this.inherited.has(packageName)) {
        this.inherited.set(packageName, new Map());
      }
    }
  }

  /** Dependencies that own an option group, empty or not, sorted by name. */
  packageNames(): string[] {
    return Array.from(this.inherited.keys()).sort(compareText);
  }

  get(key: string): string | undefined {
    const separator = key.indexOf(PACKAGE_SEPARATOR);
    if (separator < 0) {
      return this.own.get(key);
    }
    return this.inherited.get(key.slice(0, separator))?.get(key.slice(separator + 1));
  }

  entries(): Array<[string, string]> {
    const result = sortedPairs(this.own);
    for (const packageName of this.packageNames()) {
      for (const [name, value] of sortedPairs(this.groupFor(packageName))) {
        result.push([`${packageName}${PACKAGE_SEPARATOR}${name}`, value]);
      }
    }
    return result;
  }

  /**
   * Own options always count; a dependency's options count only when the dependency is
   * identity-relevant under `relevanceFilter`.
   */
  identityHash(relevanceFilter: RelevanceFilter = null): string {
    const lines = [groupHash(this.own)];
    for (const packageName of this.packageNames()) {
      if (relevanceFilter === null || relevanceFilter.has(packageName)) {
        lines.push(groupHash(this.groupFor(packageName)));
      }
    }
    return contentHash(lines.join("\n"));
  }

  canonicalDump(): string {
    return formatKeyValueLines(this.entries());
  }

  toStructured(): StructuredPairs {
    return this.entries();
  }

  private set(key: string, value: string): void {
    const separator = key.indexOf(PACKAGE_SEPARATOR);
    if (separator < 0) {
      this.own.set(key, value);
      return;
    }

    const packageName = key.slice(0, separator);
    const group = this.inherited.get(packageName) ?? new Map<string, string>();
    group.set(key.slice(separator + 1), value);
    this.inherited.set(packageName, group);
  }

  private groupFor(packageName: string): OptionGroup {
    return this.inherited.get(packageName) ?? new Map();
  }
}

function sortedPairs(group: OptionGroup): Array<[string, string]> {
  return Array.from(group).sort(([a], [b]) => compareText(a, b));
}

function groupHash(group: OptionGroup): string {
  return contentHash(
    formatKeyValueLines(sortedPairs(group).filter(([, value]) => !UNSET_VALUES.has(value))),
  );
}
