import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseBuildInput } from "./build-input.js";
import { MissingIdentityFileError } from "./errors.js";
import {
  compareIdentityFiles,
  computeIdentity,
  loadIdentityFile,
  writeIdentityFile,
} from "./identity-service.js";
import { JsonlLogger } from "./logger.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

const INPUT = parseBuildInput({
  settings: { os: "Linux", arch: "x86_64", build_type: "Release" },
  options: { shared: "True", "Zlib:shared": "False" },
  requires: ["Hello/1.2.0@lasote/stable", "Zlib/1.2.11"],
  indirect_requires: ["Bzip2/1.0.8"],
});

const PACKAGE_ID = "e852dc8820b3c53d3f8d0c46950be01c8b2546dc";

describe("identity service", () => {
  it("computes, writes and reloads an identity with logged events", async () => {
    const dir = makeTempDir("identity-service-");
    const logPath = path.join(dir, "events.jsonl");
    const logger = new JsonlLogger(logPath);

    const computed = computeIdentity(INPUT, { logger });
    expect(computed.packageId).toBe(PACKAGE_ID);

    const written = await writeIdentityFile(path.join(dir, "out", "pkginfo.txt"), computed.identity, {
      logger,
    });
    expect(fs.readFileSync(written, "utf8")).toBe(computed.identity.canonicalDump());

    const loaded = loadIdentityFile(written, { logger });
    expect(loaded.packageId).toBe(PACKAGE_ID);
    expect(loaded.identity.equals(computed.identity)).toBe(true);

    const events = fs
      .readFileSync(logPath, "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line) as { type: string; requires?: number });
    expect(events.map((event) => event.type)).toEqual([
      "identity.computed",
      "identity.written",
      "identity.loaded",
    ]);
    expect(events[0]?.requires).toBe(2);
  });

  it("compares identity files textually", async () => {
    const dir = makeTempDir("identity-service-");
    const { identity } = computeIdentity(INPUT);
    const other = computeIdentity({ ...INPUT, settings: { ...INPUT.settings, arch: "armv8" } });

    const left = await writeIdentityFile(path.join(dir, "a.txt"), identity);
    const same = await writeIdentityFile(path.join(dir, "b.txt"), identity);
    const right = await writeIdentityFile(path.join(dir, "c.txt"), other.identity);

    expect(compareIdentityFiles(left, same)).toEqual({ equal: true, packageIds: [PACKAGE_ID, PACKAGE_ID] });
    const different = compareIdentityFiles(left, right);
    expect(different.equal).toBe(false);
    expect(different.packageIds).toEqual([PACKAGE_ID, other.packageId]);
  });

  it("fails on a missing identity file", () => {
    const missing = path.join(makeTempDir("identity-service-"), "nope.txt");
    expect(() => loadIdentityFile(missing)).toThrow(MissingIdentityFileError);
  });
});
