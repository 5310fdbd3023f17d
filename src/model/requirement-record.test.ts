import { describe, expect, it } from "vitest";

import { MalformedReferenceError } from "../core/errors.js";

import {
  createRequirementRecord,
  requirementFullText,
  requirementIdentityLine,
} from "./requirement-record.js";

describe("createRequirementRecord", () => {
  it("reduces a direct requirement to its name and stable version", () => {
    const record = createRequirementRecord("Boost/1.60.0-rc1@lasote/stable:abc");

    expect(record.identity).toEqual({ kind: "direct", name: "Boost", version: "1.60.0" });
    expect(record.fullName).toBe("Boost");
    expect(record.fullVersion).toBe("1.60.0-rc1");
    expect(record.fullUser).toBe("lasote");
    expect(record.fullChannel).toBe("stable");
    expect(record.fullPackageIdentity).toBe("abc");
    expect(requirementIdentityLine(record)).toBe("Boost/1.60.0");
  });

  it("keeps nothing of an indirect requirement in its identity", () => {
    const record = createRequirementRecord("Zlib/1.2.11@demo/testing", { indirect: true });

    expect(record.identity).toEqual({ kind: "indirect" });
    expect(requirementIdentityLine(record)).toBe("");
    expect(record.fullName).toBe("Zlib");
  });

  it("keeps the verbatim reference as full text", () => {
    const text = "Boost/1.60.0-rc1@lasote/stable:abc";
    expect(requirementFullText(createRequirementRecord(text))).toBe(text);
    expect(requirementFullText(createRequirementRecord(text, { indirect: true }))).toBe(text);
  });

  it("rejects malformed references", () => {
    expect(() => createRequirementRecord("Boost")).toThrow(MalformedReferenceError);
  });
});
