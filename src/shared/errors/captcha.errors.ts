/**
 * CAPTCHA-Specific Error Classes
 *
 * Granular errors for the CAPTCHA solving pipeline.
 * Oracle clients raise the API errors; the solver facade raises
 * OracleError once every configured oracle is exhausted.
 */
import { ERROR_CODES } from "../../config/constants";
import { ScrapeError } from "./scrape.errors";

/** Captcha service unavailable or returned no solution */
export class OracleError extends ScrapeError {
  constructor(message: string = "Captcha oracle returned no solution") {
    super(message, ERROR_CODES.ORACLE_FAILED, true);
    this.name = "OracleError";
  }
}

/** 2Captcha API returned an error or timed out */
export class TwoCaptchaApiError extends OracleError {
  constructor(message: string = "2Captcha API error") {
    super(message);
    this.name = "TwoCaptchaApiError";
  }
}

/** CapSolver API returned an error or timed out */
export class CapSolverApiError extends OracleError {
  constructor(message: string = "CapSolver API error") {
    super(message);
    this.name = "CapSolverApiError";
  }
}

/** CAPTCHA image could not be captured from the page */
export class CaptchaImageCaptureError extends OracleError {
  constructor(message: string = "Could not capture CAPTCHA image") {
    super(message);
    this.name = "CaptchaImageCaptureError";
  }
}
