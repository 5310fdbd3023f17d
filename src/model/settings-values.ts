// Build settings snapshot (os, compiler, arch, ...) keyed by dotted names like `compiler.version`.

import { contentHash } from "../core/hash.js";

import { formatKeyValueLines, parseKeyValueLines } from "./section-text.js";
import { parseStructured, StructuredPairsSchema, type StructuredPairs } from "./structured.js";
import { compareText } from "./version.js";

// A `None` value can be introduced for an existing setting without changing any package ID.
const UNSET_VALUES = new Set(["", "None"]);

export class SettingsValues {
  private readonly values: Map<string, string>;

  constructor(values: Iterable<readonly [string, string]> = []) {
    this.values = new Map(Array.from(values, ([key, value]) => [key.trim(), value.trim()]));
  }

  static fromRecord(record: Record<string, string>): SettingsValues {
    return new SettingsValues(Object.entries(record));
  }

  static parse(text: string, section = "settings"): SettingsValues {
    return new SettingsValues(parseKeyValueLines(text, section));
  }

  static fromStructured(data: unknown): SettingsValues {
    return new SettingsValues(parseStructured(StructuredPairsSchema, data, "settings"));
  }

  copy(): SettingsValues {
    return new SettingsValues(this.values);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  /** Pruned copy without each key and its dotted children (`compiler` drops `compiler.version`). */
  without(keys: Iterable<string>): SettingsValues {
    const dropped = Array.from(keys);
    return new SettingsValues(
      this.entries().filter(
        ([key]) => !dropped.some((prefix) => key === prefix || key.startsWith(`${prefix}.`)),
      ),
    );
  }

  entries(): Array<[string, string]> {
    return Array.from(this.values).sort(([a], [b]) => compareText(a, b));
  }

  identityHash(): string {
    return contentHash(
      formatKeyValueLines(this.entries().filter(([, value]) => !UNSET_VALUES.has(value))),
    );
  }

  canonicalDump(): string {
    return formatKeyValueLines(this.entries());
  }

  toStructured(): StructuredPairs {
    return this.entries();
  }
}
