// Component references: the name of one built package.
// Purpose: parse, render and order `name/version[@user/channel][:package_id]` texts.
// Assumes references are used as map keys through their rendered text.

import { MalformedReferenceError } from "../core/errors.js";

import { compareText, compareVersions } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export type ComponentRef = Readonly<{
  name: string;
  version: string;
  user?: string;
  channel?: string;
  packageIdentity?: string;
}>;

type ComponentRefInput = {
  name: string;
  version: string;
  user?: string;
  channel?: string;
  packageIdentity?: string;
};

const SEGMENT = "[A-Za-z0-9_][A-Za-z0-9_+.-]{0,50}";
const PACKAGE_IDENTITY = "[^\\s/@:]+";

const REFERENCE_PATTERN = new RegExp(
  `^(${SEGMENT})/(${SEGMENT})(?:@(${SEGMENT})/(${SEGMENT}))?(?::(${PACKAGE_IDENTITY}))?$`,
);

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseComponentRef(text: string): ComponentRef {
  const match = REFERENCE_PATTERN.exec(text.trim());
  if (!match) {
    throw new MalformedReferenceError(text);
  }

  const [, name, version, user, channel, packageIdentity] = match;
  const ref: ComponentRefInput = { name, version };
  if (user !== undefined && channel !== undefined) {
    ref.user = user;
    ref.channel = channel;
  }
  if (packageIdentity !== undefined) {
    ref.packageIdentity = packageIdentity;
  }

  return Object.freeze(ref);
}

export function formatComponentRef(ref: ComponentRef): string {
  return renderParts(ref);
}

export function componentRefKey(ref: ComponentRef): string {
  return formatComponentRef(ref);
}

export function compareComponentRefs(a: ComponentRef, b: ComponentRef): number {
  return (
    compareText(a.name, b.name) ||
    compareVersions(a.version, b.version) ||
    compareOptional(a.user, b.user) ||
    compareOptional(a.channel, b.channel) ||
    compareOptional(a.packageIdentity, b.packageIdentity)
  );
}

export function sortComponentRefs(refs: Iterable<ComponentRef>): ComponentRef[] {
  return Array.from(refs).sort(compareComponentRefs);
}

// =============================================================================
// HELPERS
// =============================================================================

function renderParts(ref: ComponentRefInput): string {
  let text = `${ref.name}/${ref.version}`;
  if (ref.user !== undefined && ref.channel !== undefined) {
    text += `@${ref.user}/${ref.channel}`;
  }
  if (ref.packageIdentity !== undefined) {
    text += `:${ref.packageIdentity}`;
  }
  return text;
}

function compareOptional(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return compareText(a, b);
}
