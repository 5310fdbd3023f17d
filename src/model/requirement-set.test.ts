import { describe, expect, it } from "vitest";

import { AmbiguousRequirementError, ConfigError } from "../core/errors.js";
import { contentHash } from "../core/hash.js";

import { formatComponentRef, parseComponentRef } from "./component-ref.js";
import { requirementIdentityLine } from "./requirement-record.js";
import { RequirementSet, stripDevMarker } from "./requirement-set.js";

const refs = (...texts: string[]) => texts.map(parseComponentRef);

describe("RequirementSet", () => {
  it("hashes direct identity lines and empty lines for indirect records", () => {
    const set = RequirementSet.create(refs("A/1.0"));
    set.addIndirect(refs("B/2.0"));

    expect(set.identityHash()).toBe(contentHash("A/1.0\n"));
    expect(set.canonicalDump()).toBe("A/1.0");
  });

  it("excludes dev requirements from the hash but tags them in the dump", () => {
    const set = RequirementSet.create(refs("B/2.0", "A/1.0"), ["A"]);

    expect(set.identityHash()).toBe(contentHash("A/1.0"));
    expect(set.canonicalDump()).toBe("A/1.0\nB/2.0 DEV");
    expect(set.relevanceFilter).toEqual(new Set(["A"]));
  });

  it("does not depend on insertion order", () => {
    const first = RequirementSet.create(refs("B/2.0@u/c", "A/1.0", "C/3.1-rc2"));
    first.addIndirect(refs("E/1", "D/1"));
    const second = RequirementSet.create(refs("C/3.1-rc2", "A/1.0", "B/2.0@u/c"));
    second.addIndirect(refs("D/1", "E/1"));

    expect(second.identityHash()).toBe(first.identityHash());
    expect(second.canonicalDump()).toBe(first.canonicalDump());
    expect(first.canonicalDump()).toBe("A/1.0\nB/2.0\nC/3.1");
  });

  it("lets a later indirect insert replace a direct record", () => {
    const set = RequirementSet.create(refs("A/1.0"));
    set.addIndirect(refs("A/1.0"));

    expect(set.size).toBe(1);
    expect(set.canonicalDump()).toBe("");
    expect(set.identityHash()).toBe(contentHash(""));
  });

  it("lists every reference", () => {
    const set = RequirementSet.create(refs("A/1.0"));
    set.addIndirect(refs("B/2.0"));

    expect(set.allRefs().map(formatComponentRef).sort()).toEqual(["A/1.0", "B/2.0"]);
  });

  describe("lookupByNamePrefix", () => {
    const set = RequirementSet.create(refs("Boost/1.0", "BoostExtra/2.0"));

    it("fails when the prefix matches more than one reference", () => {
      let error: unknown = null;
      try {
        set.lookupByNamePrefix("Boost");
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(AmbiguousRequirementError);
      const ambiguous = error as AmbiguousRequirementError;
      expect(ambiguous.prefix).toBe("Boost");
      expect(ambiguous.matches).toEqual(["Boost/1.0", "BoostExtra/2.0"]);
    });

    it("fails when nothing matches", () => {
      expect(() => set.lookupByNamePrefix("Zlib")).toThrow('No requirement matches "Zlib"');
    });

    it("returns the single match", () => {
      const record = set.lookupByNamePrefix("Boost/1");
      expect(record.fullName).toBe("Boost");
      expect(requirementIdentityLine(record)).toBe("Boost/1.0");
    });
  });

  describe("structured form", () => {
    it("maps each reference to its full text", () => {
      const set = RequirementSet.create(refs("A/1.0"), ["A"]);
      set.addIndirect(refs("B/2.0@u/c"));

      expect(set.toStructured()).toEqual({ "A/1.0": "A/1.0", "B/2.0@u/c": "B/2.0@u/c" });
    });

    it("rebuilds direct records without a relevance filter", () => {
      const set = RequirementSet.fromStructured({ "A/1.0": "A/1.0", "B/2.0@u/c": "B/2.0@u/c" });

      expect(set.relevanceFilter).toBeNull();
      expect(set.canonicalDump()).toBe("A/1.0\nB/2.0");
    });

    it("rejects values that are not strings", () => {
      expect(() => RequirementSet.fromStructured({ "A/1.0": 3 })).toThrow(ConfigError);
    });
  });
});

describe("stripDevMarker", () => {
  it("splits the DEV suffix", () => {
    expect(stripDevMarker("B/2.0 DEV")).toEqual({ line: "B/2.0", dev: true });
    expect(stripDevMarker("B/2.0")).toEqual({ line: "B/2.0", dev: false });
  });
});
