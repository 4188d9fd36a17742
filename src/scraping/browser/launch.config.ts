/**
 * Browser Configuration
 *
 * Launch settings for the Chromium instance that drives the portal.
 * The portal only accepts desktop browsers, so the headless user agent
 * is replaced and the automation flags are removed before any page
 * script runs.
 */

/**
 * Chrome launch arguments.
 * --disable-blink-features=AutomationControlled removes the
 * "navigator.webdriver" flag; the rest keep memory low in containers.
 */
export const LAUNCH_ARGS: string[] = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-gpu",
  "--disable-dev-shm-usage",
  "--no-default-browser-check",
];

export const VIEWPORT = { width: 1366, height: 768 } as const;

export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36";

/** Evaluated in every document before the portal's own scripts */
export const INIT_SCRIPT = `
  delete Object.getPrototypeOf(navigator).webdriver;
  window.chrome = { runtime: {} };
`;
