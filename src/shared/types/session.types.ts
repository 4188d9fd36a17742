/**
 * Session Types
 *
 * Data structures produced and consumed while one controller run drives
 * the portal: login attempts, readiness checks, progress polling and the
 * exported artifact.
 */

export interface Credentials {
  username: string;
  password: string;
}

/** Configured limits of one session */
export interface SessionLimits {
  maxCaptchaRetries: number;
  pageTimeoutMs: number;
  elementTimeoutMs: number;
  newWindowTimeoutMs: number;
  completionTimeoutMs: number;
  pollUnitMs: number;
  exportTimeoutMs: number;
}

/**
 * One iteration of the login retry loop.
 * Discarded once its verification outcome is known.
 */
export interface LoginAttempt {
  /** 1-based, never above SessionLimits.maxCaptchaRetries */
  index: number;
  /** Captcha `src` before submit; a different value after submit means rejection */
  initialCaptchaSrc: string | null;
  /** Temporary file holding the captured captcha image */
  captchaImagePath?: string;
  solution?: string;
}

/** Login state machine states */
export type LoginState =
  | "Init"
  | "BrowserReady"
  | "ElementsLocated"
  | "CaptchaCaptured"
  | "FormSubmitted"
  | "VerifyingOutcome"
  | "Success"
  | "RetryOrFail";

export type ReadinessCondition =
  | { kind: "network-idle" }
  | { kind: "document-ready" }
  | { kind: "element-visible"; selector: string };

/** Named set of wait conditions resolved as one pass/fail outcome */
export interface ReadinessSpec {
  readonly stepName: string;
  readonly timeoutMs: number;
  readonly conditions: readonly ReadinessCondition[];
  /** Re-probed after a timeout; any match turns the timeout into success */
  readonly criticalSelectors: readonly string[];
}

export type ProgressClassification =
  | "indicator_not_found"
  | "invalid_format"
  | "no_total_found"
  | "zero_total"
  | "complete"
  | "error";

export interface ProgressStatus {
  classification: ProgressClassification;
  rawText: string | null;
  total: number | null;
  /** Error message when classification is "error" */
  detail?: string;
}

export interface CompletionResult {
  completed: boolean;
  status: ProgressStatus;
  ticks: number;
  elapsedMs: number;
}

export type FormatClass = "spreadsheet" | "other";

export interface ArtifactValidation {
  valid: boolean;
  reason?: string;
  sheetCount?: number;
}

export interface DownloadArtifact {
  path: string;
  size: number;
  suggestedName: string;
  formatClass: FormatClass;
  validation: ArtifactValidation;
}

/** Public outcome of one controller run */
export interface SessionOutcome {
  success: boolean;
  artifactPath: string | null;
}
