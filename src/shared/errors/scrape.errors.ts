/**
 * Custom Error Classes for Portal Automation
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * Components throw these internally and translate them into
 * boolean/optional results at their boundary; the orchestrator uses
 * `retryable` to decide whether a whole run is worth repeating.
 */
import { ERROR_CODES, ErrorCode } from "../../config/constants";

/**
 * Base class for all scraping errors.
 * Includes an error code for classification in logs.
 */
export class ScrapeError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable: boolean = true) {
    super(message);
    this.name = "ScrapeError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Navigation or element interaction failed in the browser */
export class DriverError extends ScrapeError {
  constructor(message: string = "Browser driver error") {
    super(message, ERROR_CODES.DRIVER_ERROR, true);
    this.name = "DriverError";
  }
}

/** A bounded wait was exceeded */
export class TimeoutError extends ScrapeError {
  constructor(message: string = "Wait timed out") {
    super(message, ERROR_CODES.TIMEOUT, true);
    this.name = "TimeoutError";
  }
}

/** Login or a step outcome could not be confirmed */
export class VerificationFailure extends ScrapeError {
  constructor(message: string = "Outcome not confirmed") {
    super(message, ERROR_CODES.VERIFICATION_FAILED, true);
    this.name = "VerificationFailure";
  }
}

/** Exported artifact is empty or malformed */
export class ValidationError extends ScrapeError {
  constructor(message: string = "Artifact validation failed") {
    super(message, ERROR_CODES.VALIDATION_FAILED, false);
    this.name = "ValidationError";
  }
}

/** An expected element was missing at a navigation step */
export class NavigationStepError extends ScrapeError {
  public readonly step: string;

  constructor(step: string, message: string = `Navigation step failed: ${step}`) {
    super(message, ERROR_CODES.NAVIGATION_FAILED, true);
    this.name = "NavigationStepError";
    this.step = step;
  }
}

/** Extract a loggable message from anything thrown */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
