import {
  ConfigError,
  IngestError,
  OutputError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import {
  LicenseIncompatibleCycleError,
  MergeAbortedError,
  ParseError,
  PassTimeoutError,
  UnresolvedReferenceError,
} from "../engine/errors.js";

const CYCLE_HINT =
  "Set engine.allow_incompatible_cycles: true to report the cycle without failing, or drop one of the repositories.";
const TIMEOUT_HINT =
  "Raise engine.pass_timeout_seconds (0 disables the budget) or remove the pass from engine.enabled_optimization_passes.";
const VERIFY_HINT = "Re-run with --debug and keep the conflict report; this points at an engine defect.";
const INGEST_HINT = "Check the repository path and include/exclude globs in the config.";
const CONFIG_HINT = "Fix the config file and re-run.";
const OUTPUT_HINT = "Check that the output directory is writable, or pass --out <dir>.";
const REPORT_NEXT = "Inspect the partial conflict report with `autodeploy report`.";

// Engine and ingest failures become display-ready errors; anything already user-facing passes through.
export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof LicenseIncompatibleCycleError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.license,
      title: "License-incompatible dependency cycle.",
      message: error.message,
      hint: CYCLE_HINT,
      next: REPORT_NEXT,
      cause: error,
    });
  }

  if (error instanceof PassTimeoutError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.merge,
      title: "Optimization pass timed out.",
      message: error.message,
      hint: TIMEOUT_HINT,
      next: REPORT_NEXT,
      cause: error,
    });
  }

  if (error instanceof UnresolvedReferenceError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.merge,
      title: "Merged output failed verification.",
      message: error.message,
      hint: VERIFY_HINT,
      cause: error,
    });
  }

  if (error instanceof MergeAbortedError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.merge,
      title: "Merge aborted.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof IngestError || error instanceof ParseError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.ingest,
      title: "Repository ingest failed.",
      message: error.message,
      hint: INGEST_HINT,
      cause: error,
    });
  }

  if (error instanceof OutputError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.output,
      title: "Output not writable.",
      message: error.message,
      hint: OUTPUT_HINT,
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error.",
      message: error.message,
      hint: CONFIG_HINT,
      cause: error,
    });
  }

  return error;
}
