// Requirement records: what one dependency contributes to a package ID.
// Purpose: keep the full reference for provenance and a reduced identity for hashing.
// Assumes indirect (transitive) requirements contribute nothing to the hash by default.

import { formatComponentRef, parseComponentRef, type ComponentRef } from "./component-ref.js";
import { stabilizeVersion } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

// Reserved fields: no current path populates them, but identity lines are defined over them.
type ReservedIdentityFields = {
  user?: string;
  channel?: string;
  packageIdentity?: string;
};

export type DirectIdentity = ReservedIdentityFields & {
  kind: "direct";
  name: string;
  version: string;
};

export type IndirectIdentity = ReservedIdentityFields & {
  kind: "indirect";
};

export type RequirementIdentity = DirectIdentity | IndirectIdentity;

export type RequirementRecord = Readonly<{
  ref: ComponentRef;
  fullName: string;
  fullVersion: string;
  fullUser?: string;
  fullChannel?: string;
  fullPackageIdentity?: string;
  identity: Readonly<RequirementIdentity>;
}>;

export type RequirementRecordOptions = {
  indirect?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createRequirementRecord(
  text: string,
  options: RequirementRecordOptions = {},
): RequirementRecord {
  return requirementRecordFromRef(parseComponentRef(text), options);
}

export function requirementRecordFromRef(
  ref: ComponentRef,
  options: RequirementRecordOptions = {},
): RequirementRecord {
  const identity: RequirementIdentity = options.indirect
    ? { kind: "indirect" }
    : { kind: "direct", name: ref.name, version: stabilizeVersion(ref.version) };

  return Object.freeze({
    ref,
    fullName: ref.name,
    fullVersion: ref.version,
    fullUser: ref.user,
    fullChannel: ref.channel,
    fullPackageIdentity: ref.packageIdentity,
    identity: Object.freeze(identity),
  });
}

export function requirementIdentityLine(record: RequirementRecord): string {
  const { identity } = record;
  const fields =
    identity.kind === "direct"
      ? [identity.name, identity.version, identity.user, identity.channel, identity.packageIdentity]
      : [identity.user, identity.channel, identity.packageIdentity];

  return fields.filter((field): field is string => Boolean(field)).join("/");
}

export function requirementFullText(record: RequirementRecord): string {
  return formatComponentRef(record.ref);
}
