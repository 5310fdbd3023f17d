// Full requirement manifests: every resolved reference, kept for provenance and never hashed.

import { z } from "zod";

import {
  formatComponentRef,
  parseComponentRef,
  sortComponentRefs,
  type ComponentRef,
} from "./component-ref.js";
import { parseStructured } from "./structured.js";

export const StructuredManifestSchema = z.array(z.string());

export class RequirementManifest {
  private readonly refs: ComponentRef[];

  constructor(refs: Iterable<ComponentRef> = []) {
    this.refs = Array.from(refs);
  }

  static parse(lines: string[]): RequirementManifest {
    return new RequirementManifest(lines.map((line) => parseComponentRef(line)));
  }

  static parseText(text: string): RequirementManifest {
    return RequirementManifest.parse(
      text
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
  }

  static fromStructured(data: unknown): RequirementManifest {
    return RequirementManifest.parse(parseStructured(StructuredManifestSchema, data, "full_requires"));
  }

  extend(refs: Iterable<ComponentRef>): void {
    this.refs.push(...refs);
  }

  get length(): number {
    return this.refs.length;
  }

  sorted(): ComponentRef[] {
    return sortComponentRefs(this.refs);
  }

  toStructured(): string[] {
    return this.sorted().map(formatComponentRef);
  }

  canonicalDump(): string {
    return this.toStructured().join("\n");
  }
}
