// Scope values (`dev=True`, `Poco:dev=False`) recorded alongside an identity; never hashed.

import { formatKeyValueLines, parseKeyValueLines } from "./section-text.js";
import { compareText } from "./version.js";

const PACKAGE_SEPARATOR = ":";

export class Scopes {
  private readonly root = new Map<string, string>();
  private readonly packages = new Map<string, Map<string, string>>();

  constructor(values: Iterable<readonly [string, string]> = []) {
    for (const [key, value] of values) {
      const separator = key.indexOf(PACKAGE_SEPARATOR);
      if (separator < 0) {
        this.root.set(key, value);
        continue;
      }

      const packageName = key.slice(0, separator);
      const scope = this.packages.get(packageName) ?? new Map<string, string>();
      scope.set(key.slice(separator + 1), value);
      this.packages.set(packageName, scope);
    }
  }

  static parse(text: string): Scopes {
    return new Scopes(parseKeyValueLines(text, "scope"));
  }

  isEmpty(): boolean {
    return this.root.size === 0 && this.packages.size === 0;
  }

  entries(): Array<[string, string]> {
    const result = sortedPairs(this.root);
    const names = Array.from(this.packages.keys()).sort(compareText);
    for (const packageName of names) {
      for (const [name, value] of sortedPairs(this.packages.get(packageName) ?? new Map())) {
        result.push([`${packageName}${PACKAGE_SEPARATOR}${name}`, value]);
      }
    }
    return result;
  }

  canonicalDump(): string {
    return formatKeyValueLines(this.entries());
  }
}

function sortedPairs(values: Map<string, string>): Array<[string, string]> {
  return Array.from(values).sort(([a], [b]) => compareText(a, b));
}
