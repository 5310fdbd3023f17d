// Sectioned text used by persisted identity files.
// Purpose: split `[section]` blocks into bodies and parse `key=value` lines inside them.
// Assumes body lines are indented on write and trimmed on read.

import { MalformedIdentityFileError } from "../core/errors.js";

export type SectionMap = ReadonlyMap<string, string>;

const SECTION_HEADER = /^\[([a-z_]{2,50})\]$/;
const INDENT = "    ";

export function parseSections(text: string, allowed: readonly string[]): SectionMap {
  const sections = new Map<string, string[]>();
  let current: string[] | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    if (line.startsWith("[")) {
      const match = SECTION_HEADER.exec(line);
      if (!match) {
        throw new MalformedIdentityFileError("<header>", `Bad section header '${line}'`);
      }
      const name = match[1];
      if (!allowed.includes(name)) {
        throw new MalformedIdentityFileError(name, `Unrecognized section '${name}'`);
      }
      current = [];
      sections.set(name, current);
      continue;
    }

    if (current === null) {
      throw new MalformedIdentityFileError("<none>", `Unexpected line before any section '${line}'`);
    }
    current.push(line);
  }

  return new Map(Array.from(sections, ([name, lines]) => [name, lines.join("\n")]));
}

export function requireSection(sections: SectionMap, name: string): string {
  const body = sections.get(name);
  if (body === undefined) {
    throw new MalformedIdentityFileError(name, `Missing section [${name}]`);
  }
  return body;
}

export function indentBlock(text: string): string {
  return text
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => `${INDENT}${line}`)
    .join("\n");
}

export function parseKeyValueLines(text: string, section: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    const separator = line.indexOf("=");
    const key = separator > 0 ? line.slice(0, separator).trim() : "";
    if (!key) {
      throw new MalformedIdentityFileError(section, `Expected key=value in [${section}], got '${line}'`);
    }
    pairs.push([key, line.slice(separator + 1).trim()]);
  }

  return pairs;
}

export function formatKeyValueLines(pairs: Iterable<readonly [string, string]>): string {
  return Array.from(pairs, ([key, value]) => `${key}=${value}`).join("\n");
}
