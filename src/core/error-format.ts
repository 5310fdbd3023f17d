/*
Purpose: turn thrown errors into printable lines for the CLI, with optional ANSI styling.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  toUserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    return `${styles.map((style) => ANSI_STYLES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  return (options.useColor ?? true) && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if ((options.mode ?? "short") === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const root = normalized.cause instanceof Error ? normalized.cause : error;
    if (root instanceof Error) {
      lines.push({ kind: "name", text: root.name });
    }

    const cause = resolveCauseMessage(normalized);
    if (cause) {
      lines.push({ kind: "cause", text: cause });
    }

    if (root instanceof Error && root.stack) {
      lines.push({ kind: "stack", text: root.stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return normalizeOptionalText(error.message) ?? error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeError(error: unknown): UserFacingErrorInput {
  const userError = toUserFacingError(error);
  if (userError) {
    return {
      code: userError.code,
      title: normalizeOptionalText(userError.title) ?? DEFAULT_ERROR_TITLE,
      message: normalizeOptionalText(userError.message) ?? DEFAULT_ERROR_MESSAGE,
      hint: normalizeOptionalText(userError.hint),
      next: normalizeOptionalText(userError.next),
      cause: userError.cause,
    };
  }

  const message =
    error === null || error === undefined
      ? undefined
      : normalizeOptionalText(formatErrorMessage(error));

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: message ?? DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveCauseMessage(normalized: UserFacingErrorInput): string | undefined {
  if (normalized.cause === undefined || normalized.cause === null) {
    return undefined;
  }

  const resolved = normalizeOptionalText(formatErrorMessage(normalized.cause));
  if (!resolved || resolved === normalized.message) {
    return undefined;
  }

  return resolved;
}
