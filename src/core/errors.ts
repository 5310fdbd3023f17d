/*
Purpose: error types raised while building, parsing and loading package identities.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new MalformedReferenceError(text); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class IdentityError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "IdentityError";
  }
}

export class MalformedReferenceError extends IdentityError {
  constructor(
    public readonly text: string,
    cause?: unknown,
  ) {
    super(`Malformed component reference "${text}"`, cause);
    this.name = "MalformedReferenceError";
  }
}

export class AmbiguousRequirementError extends IdentityError {
  constructor(
    public readonly prefix: string,
    public readonly matches: string[],
  ) {
    super(
      matches.length === 0
        ? `No requirement matches "${prefix}"`
        : `Requirement "${prefix}" is ambiguous: ${matches.join(", ")}`,
    );
    this.name = "AmbiguousRequirementError";
  }
}

export class MissingIdentityFileError extends IdentityError {
  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(`Identity file does not exist: ${filePath}`, cause);
    this.name = "MissingIdentityFileError";
  }
}

export class MalformedIdentityFileError extends IdentityError {
  constructor(
    public readonly section: string,
    message: string,
  ) {
    super(message);
    this.name = "MalformedIdentityFileError";
  }
}

export class ConfigError extends IdentityError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  reference: "REFERENCE_ERROR",
  identityFile: "IDENTITY_FILE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

export function toUserFacingError(error: unknown): UserFacingError | null {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof MalformedReferenceError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.reference,
      title: "Invalid component reference.",
      message: error.message,
      hint: "References look like name/version[@user/channel][:package_id].",
      cause: error,
    });
  }

  if (error instanceof AmbiguousRequirementError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.reference,
      title: "Requirement lookup failed.",
      message: error.message,
      hint: "Use a longer prefix, such as name/version.",
      cause: error,
    });
  }

  if (error instanceof MissingIdentityFileError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.identityFile,
      title: "Identity file missing.",
      message: error.message,
      next: "Run `pkgid compute <input> --out <file>` to create it.",
      cause: error,
    });
  }

  if (error instanceof MalformedIdentityFileError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.identityFile,
      title: "Identity file invalid.",
      message: error.message,
      hint: error.section.startsWith("<")
        ? "Each section starts with a lowercase [name] header line."
        : `Check the [${error.section}] section.`,
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Build input invalid.",
      message: error.message,
      cause: error,
    });
  }

  return null;
}
