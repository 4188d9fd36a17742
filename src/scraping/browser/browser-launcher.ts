/**
 * Browser Launcher
 *
 * Launches the Chromium instance a session runs in, backed by a
 * persistent profile directory so cookies survive between runs.
 * Every page the portal opens (the post-login window included) gets the
 * same user agent and init script as the first one.
 */
import puppeteer, { Browser, BrowserEvent, Page, Target } from "puppeteer-core";
import * as fs from "fs";
import { INIT_SCRIPT, LAUNCH_ARGS, USER_AGENT, VIEWPORT } from "./launch.config";
import { PuppeteerContext } from "../driver/puppeteer.driver";
import { UiContext } from "../../shared/types/driver.types";
import { AppConfig } from "../../config";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("browser");

export interface LaunchSettings {
  executablePath?: string;
  headless: boolean;
  profileDir: string;
  downloadDir: string;
  pageTimeoutMs: number;
}

export function launchSettingsFrom(config: AppConfig): LaunchSettings {
  return {
    executablePath: config.chromeExecutablePath,
    headless: config.browserHeadless,
    profileDir: config.browserProfileDir,
    downloadDir: config.downloadDir,
    pageTimeoutMs: config.pageTimeoutMs,
  };
}

/**
 * Apply the user agent and init script to one page.
 */
async function preparePage(page: Page, timeoutMs: number): Promise<void> {
  page.setDefaultTimeout(timeoutMs);
  page.setDefaultNavigationTimeout(timeoutMs);
  await page.setUserAgent(USER_AGENT);
  await page.evaluateOnNewDocument(INIT_SCRIPT);
}

/**
 * Launch Chromium and wrap it as a UiContext.
 * Without an explicit executable, the locally installed Chrome is used.
 */
export async function launchPortalContext(settings: LaunchSettings): Promise<UiContext> {
  fs.mkdirSync(settings.profileDir, { recursive: true });

  const browser: Browser = await puppeteer.launch({
    executablePath: settings.executablePath,
    channel: settings.executablePath ? undefined : "chrome",
    headless: settings.headless,
    userDataDir: settings.profileDir,
    args: LAUNCH_ARGS,
    defaultViewport: { ...VIEWPORT },
    ignoreHTTPSErrors: true,
    timeout: settings.pageTimeoutMs,
  });

  browser.on(BrowserEvent.TargetCreated, (target: Target) => {
    target
      .page()
      .then((page) => (page ? preparePage(page, settings.pageTimeoutMs) : undefined))
      .catch((error: Error) => {
        log.debug({ error: error.message }, "Could not prepare new page");
      });
  });

  // The persistent profile opens with one page already
  for (const page of await browser.pages()) {
    await preparePage(page, settings.pageTimeoutMs);
  }

  log.info(
    { version: await browser.version(), headless: settings.headless, profileDir: settings.profileDir },
    "Browser launched"
  );

  return new PuppeteerContext(browser, settings.downloadDir);
}
