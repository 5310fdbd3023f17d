import { describe, expect, it } from "vitest";

import { ConfigError, MalformedIdentityFileError } from "../core/errors.js";
import { contentHash } from "../core/hash.js";

import { SettingsValues } from "./settings-values.js";

const sample = () =>
  SettingsValues.fromRecord({
    os: "Linux",
    compiler: "gcc",
    "compiler.version": "9",
    arch: "None",
  });

describe("SettingsValues", () => {
  it("dumps key=value lines sorted by key", () => {
    expect(sample().canonicalDump()).toBe("arch=None\ncompiler=gcc\ncompiler.version=9\nos=Linux");
  });

  it("leaves None values out of the identity hash", () => {
    expect(sample().identityHash()).toBe(contentHash("compiler=gcc\ncompiler.version=9\nos=Linux"));
    expect(sample().identityHash()).toBe(
      SettingsValues.fromRecord({ os: "Linux", compiler: "gcc", "compiler.version": "9" }).identityHash(),
    );
  });

  it("prunes keys and their dotted children into a copy", () => {
    const settings = sample();
    const pruned = settings.without(["compiler"]);

    expect(pruned.canonicalDump()).toBe("arch=None\nos=Linux");
    expect(settings.get("compiler.version")).toBe("9");
  });

  it("parses dumped text", () => {
    const parsed = SettingsValues.parse("os=Linux\n\n arch = x86 ");
    expect(parsed.entries()).toEqual([
      ["arch", "x86"],
      ["os", "Linux"],
    ]);
    expect(SettingsValues.parse(sample().canonicalDump()).canonicalDump()).toBe(
      sample().canonicalDump(),
    );
  });

  it("reports the section of a malformed line", () => {
    let error: unknown = null;
    try {
      SettingsValues.parse("=x86", "full_settings");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(MalformedIdentityFileError);
    expect((error as MalformedIdentityFileError).section).toBe("full_settings");
  });

  it("round-trips the structured form", () => {
    expect(SettingsValues.fromStructured(sample().toStructured()).canonicalDump()).toBe(
      sample().canonicalDump(),
    );
    expect(() => SettingsValues.fromStructured("os=Linux")).toThrow(ConfigError);
  });
});
