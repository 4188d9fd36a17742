/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Runtime: environment name and log level
 * - Portal: login URL, credentials, report name and time zone
 * - Captcha: 2Captcha (primary) and CapSolver (fallback) API keys
 * - Browser: Chrome executable, headless flag, persistent profile
 * - Limits: captcha retries and per-step timeouts
 * - Orchestrator: run mode, cron expression, whole-run attempts
 */
import dotenv from "dotenv";
import * as os from "os";
import * as path from "path";

dotenv.config();

export type RunMode = "once" | "cron";

export interface AppConfig {
  env: string;
  logLevel: string;

  portalLoginUrl: string;
  portalUsername: string;
  portalPassword: string;
  portalTimezone: string;
  reportName: string;

  twoCaptchaApiKey: string;
  capSolverApiKey: string;

  chromeExecutablePath: string | undefined;
  browserHeadless: boolean;
  browserProfileDir: string;
  downloadDir: string;

  maxCaptchaRetries: number;
  pageTimeoutMs: number;
  elementTimeoutMs: number;
  newWindowTimeoutMs: number;
  completionTimeoutMs: number;
  pollUnitMs: number;
  exportTimeoutMs: number;

  runMode: RunMode;
  reportCron: string;
  runAttempts: number;
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, key: string, fallback: number): number {
  const parsed = parseInt(env[key] || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function boolFrom(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

function runModeFrom(env: Env): RunMode {
  return env.RUN_MODE === "cron" ? "cron" : "once";
}

/**
 * Build the configuration from an environment map.
 * Tests pass their own map; the service uses process.env.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  return Object.freeze({
    // --- Runtime ---
    env: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",

    // --- Portal ---
    portalLoginUrl: env.PORTAL_LOGIN_URL || "https://sigitm.vivo.com.br/app/app.jsp",
    portalUsername: env.PORTAL_USERNAME || "",
    portalPassword: env.PORTAL_PASSWORD || "",
    portalTimezone: env.PORTAL_TIMEZONE || "America/Sao_Paulo",
    reportName: env.REPORT_NAME || "CONSULTA_LOTE4_FECHADAS",

    // --- Captcha services ---
    twoCaptchaApiKey: env.TWO_CAPTCHA_API_KEY || "",
    capSolverApiKey: env.CAPSOLVER_API_KEY || "",

    // --- Browser ---
    chromeExecutablePath: env.CHROME_EXECUTABLE_PATH || undefined,
    browserHeadless: boolFrom(env, "BROWSER_HEADLESS", true),
    browserProfileDir: env.BROWSER_PROFILE_DIR || path.resolve("chrome_profile"),
    downloadDir: env.DOWNLOAD_DIR || path.join(os.homedir(), "Downloads"),

    // --- Limits ---
    maxCaptchaRetries: intFrom(env, "MAX_CAPTCHA_RETRIES", 5),
    pageTimeoutMs: intFrom(env, "PAGE_TIMEOUT_MS", 60000),
    elementTimeoutMs: intFrom(env, "ELEMENT_TIMEOUT_MS", 15000),
    newWindowTimeoutMs: intFrom(env, "NEW_WINDOW_TIMEOUT_MS", 30000),
    completionTimeoutMs: intFrom(env, "COMPLETION_TIMEOUT_MS", 120000),
    pollUnitMs: intFrom(env, "POLL_UNIT_MS", 1000),
    exportTimeoutMs: intFrom(env, "EXPORT_TIMEOUT_MS", 120000),

    // --- Orchestrator ---
    runMode: runModeFrom(env),
    reportCron: env.REPORT_CRON || "0 6 * * *",
    runAttempts: intFrom(env, "RUN_ATTEMPTS", 1),
  });
}

const config = loadConfig();

export default config;
