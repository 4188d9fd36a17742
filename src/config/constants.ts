/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes portal selectors and labels, wait budgets, polling cadence
 * and error codes.
 */

/** Build the selector of an ExtJS toolbar button by its visible label */
function buttonByLabel(label: string): string {
  return `::-p-xpath(//button[contains(@class, 'x-btn-text') and contains(., '${label}')])`;
}

// --- Portal Configuration ---
export const PORTAL = {
  /** Selectors used by Puppeteer to interact with the portal */
  SELECTORS: {
    USERNAME_INPUT: "#username",
    PASSWORD_INPUT: "#password",
    CAPTCHA_IMAGE: "#captcha",
    CAPTCHA_INPUT: ".inp-capt",
    WELCOME_MARKER: "::-p-xpath(//*[contains(text(), 'Bem-vindo')])",
    MENU_QUERIES: "::-p-xpath(//span[contains(@class, 'x-panel-header-text') and contains(., 'Consulta')])",
    SUBMENU_QUERIES: "::-p-xpath(//span[contains(@class, 'x-tree3-node-text') and contains(., 'Consultas')])",
    CLOSING_DATE_FIELD: "::-p-xpath(//tr[.//span[text()='Data Encerramento']]//td[2]//b)",
    FOCUSED_INPUT: "input:focus",
    PROGRESS_INDICATOR:
      "::-p-xpath(//div[contains(@class, 'my-paging-display') and contains(@class, 'x-component') and contains(., 'A visualizar')])",
    SAVE_BUTTON: buttonByLabel("Salvar"),
    EXECUTE_BUTTON: buttonByLabel("Executar"),
    EXPORT_BUTTON: buttonByLabel("Exportar"),
  },
  /** Row of the saved-queries grid holding the named report */
  reportRow(reportName: string): string {
    return `::-p-xpath(//div[table//div[text()='${reportName}']])`;
  },
  /** Format the portal's date editor accepts */
  DATE_FORMAT: "DD/MM/YY",
  /** Token that precedes the total in "A visualizar 1 de 500" */
  PROGRESS_MARKER: "de",
} as const;

// --- Wait Budgets ---
export const WAITS = {
  /** Default overall budget of a readiness check */
  READINESS_TIMEOUT_MS: 60000,
  /** Budget of the readiness check run after login */
  POST_LOGIN_READINESS_TIMEOUT_MS: 45000,
  /** Secondary probe for critical elements after a readiness timeout */
  RESCUE_PROBE_TIMEOUT_MS: 2000,
  /** Captcha must be visible this fast when re-read after submit */
  CAPTCHA_RECHECK_TIMEOUT_MS: 5000,
  /** Interval between scans for a new window */
  NEW_WINDOW_POLL_MS: 500,
  /** Pause after submitting the login form */
  LOGIN_SETTLE_MS: 1000,
  /** Pause for the inline date editor to open */
  EDITOR_OPEN_MS: 500,
  /** The inline editor's input must be visible within this */
  FOCUSED_INPUT_TIMEOUT_MS: 2000,
  /** Pause between saving the query and executing it */
  SAVE_SETTLE_MS: 1000,
  /** The export control must be visible within this */
  EXPORT_BUTTON_TIMEOUT_MS: 10000,
} as const;

// --- Completion Polling ---
export const POLLING = {
  /** Ticks that sleep a single poll unit before the interval widens */
  FAST_TICKS: 10,
  FAST_INTERVAL_UNITS: 1,
  SLOW_INTERVAL_UNITS: 2,
} as const;

// --- Artifact Validation ---
export const ARTIFACT = {
  SPREADSHEET_EXTENSIONS: [".xlsx", ".xls"],
  /** ZIP local file header (Office Open XML) */
  XLSX_SIGNATURE: [0x50, 0x4b, 0x03, 0x04],
  /** OLE2 compound document (legacy Excel) */
  XLS_SIGNATURE: [0xd0, 0xcf, 0x11, 0xe0],
  /** Stream names of a BIFF8 and a BIFF5 workbook inside the compound document */
  XLS_WORKBOOK_STREAMS: ["Workbook", "Book"],
} as const;

// --- Error Codes ---
// Classified error types for log entries and retry decisions.
export const ERROR_CODES = {
  DRIVER_ERROR: "DRIVER_ERROR",
  TIMEOUT: "TIMEOUT",
  ORACLE_FAILED: "ORACLE_FAILED",
  VERIFICATION_FAILED: "VERIFICATION_FAILED",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NAVIGATION_FAILED: "NAVIGATION_FAILED",
  UNKNOWN: "UNKNOWN",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// --- Orchestrator Retry ---
export const RETRY_CONFIG = {
  INITIAL_DELAY_MS: 60000,
  BACKOFF_FACTOR: 2,
} as const;
