import { describe, expect, it } from "vitest";

import { parseSections } from "../model/section-text.js";

import { createAnsiFormatter, formatErrorLines, resolveColorEnabled } from "./error-format.js";
import {
  AmbiguousRequirementError,
  MalformedIdentityFileError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "./errors.js";

function parseErrorFor(text: string): unknown {
  try {
    parseSections(text, ["settings"]);
  } catch (err) {
    return err;
  }
  return null;
}

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Build input invalid.",
      message: "settings: Expected object, received string",
      hint: "Check the build input file",
      next: "Run pkgid compute again",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Build input invalid.");
    expect(lines[1]?.text).toBe("settings: Expected object, received string");
  });

  it("maps domain errors to user-facing lines", () => {
    const lines = formatErrorLines(new MalformedIdentityFileError("scope", "Missing section [scope]"));

    expect(lines).toEqual([
      { kind: "title", text: "Identity file invalid." },
      { kind: "message", text: "Missing section [scope]" },
      { kind: "hint", text: "Check the [scope] section." },
    ]);
  });

  it("gives a header hint for errors outside any named section", () => {
    const lines = formatErrorLines(parseErrorFor("[Bad\n    os=Linux"));

    expect(lines).toEqual([
      { kind: "title", text: "Identity file invalid." },
      { kind: "message", text: "Bad section header '[Bad'" },
      { kind: "hint", text: "Each section starts with a lowercase [name] header line." },
    ]);
  });

  it("includes debug details when requested", () => {
    const lines = formatErrorLines(new AmbiguousRequirementError("Boost", ["Boost/1.0", "BoostExtra/2.0"]), {
      mode: "debug",
    });

    expect(lines.find((line) => line.kind === "code")?.text).toBe("REFERENCE_ERROR");
    expect(lines.find((line) => line.kind === "name")?.text).toBe("AmbiguousRequirementError");
    expect(lines.some((line) => line.kind === "cause")).toBe(false);
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("AmbiguousRequirementError");
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false } })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(true);
  });

  it("respects explicit useColor flags", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false })).toBe(false);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    expect(createAnsiFormatter(false)("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    expect(createAnsiFormatter(true)("alert", ["red"])).toBe("\x1b[31malert\x1b[0m");
  });
});
