/*
Purpose: error classes raised around a merge (config, ingest, output writes) and the user-facing error the CLI prints.
Assumptions: causes ride on the standard Error `cause`; only UserFacingError text is written for end users as-is.
Usage: throw new IngestError(message, repositoryId, err); throw new UserFacingError({ code, title, message, hint }).
*/

function causeOptions(cause: unknown): ErrorOptions | undefined {
  return cause === undefined ? undefined : { cause };
}

// =============================================================================
// RUN ERRORS
// =============================================================================

// `name` follows the concrete class, so subclasses only add their own fields.
export class AutoDeployError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, causeOptions(cause));
    this.name = new.target.name;
  }
}

export class ConfigError extends AutoDeployError {}

export class IngestError extends AutoDeployError {
  constructor(
    message: string,
    readonly repositoryId: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

// Writing the merged unit, the conflict report or the engine log failed.
export class OutputError extends AutoDeployError {
  constructor(
    message: string,
    readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

// =============================================================================
// CLI-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  ingest: "INGEST_ERROR",
  merge: "MERGE_ERROR",
  license: "LICENSE_ERROR",
  output: "OUTPUT_ERROR",
} as const;

export type UserFacingErrorCode = (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor({ code, title, message, hint, next, cause }: UserFacingErrorInput) {
    super(message, causeOptions(cause));
    this.name = "UserFacingError";
    this.code = code;
    this.title = title;
    this.hint = hint;
    this.next = next;
  }
}
