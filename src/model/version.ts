// Version helpers used for ordering references and for hashing direct requirements.

export type VersionPart = number | string;

const PRERELEASE_OR_BUILD = /[-+].*$/;

export function versionParts(version: string): VersionPart[] {
  return version
    .trim()
    .split(".")
    .map((part) => (/^\d+$/.test(part) ? Number(part) : part));
}

/**
 * Drops pre-release (`-rc.1`) and build metadata (`+sha.abc`) markers so the hash only
 * sees the release identity. `1.2.3-beta+build.7` stabilizes to `1.2.3`.
 */
export function stabilizeVersion(version: string): string {
  const trimmed = version.trim();
  const stable = trimmed.replace(PRERELEASE_OR_BUILD, "");
  return stable.length > 0 ? stable : trimmed;
}

export function compareVersions(a: string, b: string): number {
  const left = versionParts(a);
  const right = versionParts(b);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i += 1) {
    const order = compareParts(left[i], right[i]);
    if (order !== 0) return order;
  }

  if (left.length !== right.length) {
    return left.length - right.length;
  }

  // Distinct strings must never tie, e.g. "1.01" and "1.1".
  return compareText(a, b);
}

export function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareParts(a: VersionPart, b: VersionPart): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return compareText(a, b);
}
