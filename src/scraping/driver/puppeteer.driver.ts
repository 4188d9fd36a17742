/**
 * Puppeteer UI Driver
 *
 * Binds the UiContext / UiPage / ElementLocator capability set to
 * puppeteer-core. Locators resolve their selector on every call, so a
 * locator stays valid across re-renders of the portal's ExtJS widgets.
 *
 * Every Puppeteer failure leaves this module as a TimeoutError or a
 * DriverError.
 */
import {
  Browser,
  ElementHandle,
  Page,
  Protocol,
  TimeoutError as PuppeteerTimeoutError,
} from "puppeteer-core";
import * as fs from "fs";
import * as path from "path";
import {
  DownloadExpectation,
  DownloadHandle,
  ElementLocator,
  UiContext,
  UiPage,
} from "../../shared/types/driver.types";
import {
  DriverError,
  ScrapeError,
  TimeoutError,
  errorMessage,
} from "../../shared/errors/scrape.errors";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("driver");

/** Quiet period that counts as an idle network */
const NETWORK_IDLE_MS = 500;

function translate(error: unknown, action: string): ScrapeError {
  if (error instanceof ScrapeError) return error;
  if (error instanceof PuppeteerTimeoutError) {
    return new TimeoutError(`${action}: ${error.message}`);
  }
  return new DriverError(`${action}: ${errorMessage(error)}`);
}

interface VisibilityProbe {
  isVisible(): Promise<boolean>;
}

/**
 * First handle that is visible, in document order. ExtJS keeps hidden
 * copies of widgets (inactive tabs, cached grids) ahead of the live one.
 */
export async function firstVisible<H extends VisibilityProbe>(handles: readonly H[]): Promise<H | null> {
  for (const handle of handles) {
    if (await handle.isVisible()) return handle;
  }
  return null;
}

export class PuppeteerLocator implements ElementLocator {
  constructor(private readonly page: Page, readonly selector: string) {}

  async waitForVisible(timeoutMs: number): Promise<void> {
    try {
      const handle = await this.page.waitForSelector(this.selector, {
        visible: true,
        timeout: timeoutMs,
      });
      await handle?.dispose();
    } catch (error) {
      throw translate(error, `waiting for ${this.selector}`);
    }
  }

  async isVisible(timeoutMs?: number): Promise<boolean> {
    try {
      if (timeoutMs !== undefined) {
        await this.waitForVisible(timeoutMs);
        return true;
      }
      const handles = await this.page.$$(this.selector);
      try {
        return (await firstVisible(handles)) !== null;
      } finally {
        await Promise.all(handles.map((handle) => handle.dispose()));
      }
    } catch {
      return false;
    }
  }

  async count(): Promise<number> {
    try {
      const handles = await this.page.$$(this.selector);
      await Promise.all(handles.map((handle) => handle.dispose()));
      return handles.length;
    } catch (error) {
      throw translate(error, `counting ${this.selector}`);
    }
  }

  async click(options: { force?: boolean } = {}): Promise<void> {
    await this.withHandle("clicking", async (handle) => {
      if (options.force) {
        // Dispatch in the page, bypassing overlay/actionability checks
        await handle.evaluate((el) => {
          if (el instanceof HTMLElement) el.click();
        });
      } else {
        await handle.click();
      }
    });
  }

  async dblclick(): Promise<void> {
    await this.withHandle("double-clicking", (handle) => handle.click({ count: 2 }));
  }

  async fill(text: string): Promise<void> {
    try {
      await this.page.locator(this.selector).fill(text);
    } catch (error) {
      throw translate(error, `filling ${this.selector}`);
    }
  }

  async textContent(): Promise<string | null> {
    return this.withHandle("reading text of", (handle) =>
      handle.evaluate((el) => el.textContent)
    );
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.withHandle(`reading ${name} of`, (handle) =>
      handle.evaluate((el, attr) => el.getAttribute(attr), name)
    );
  }

  async screenshot(filePath?: string): Promise<Buffer> {
    return this.withHandle("capturing", async (handle) => {
      const bytes = await handle.screenshot({ type: "png", path: filePath });
      return Buffer.from(bytes);
    });
  }

  /** The first visible match, else the first match in document order */
  private async resolve(): Promise<ElementHandle<Element> | null> {
    const handles = await this.page.$$(this.selector);
    const chosen = (await firstVisible(handles)) ?? handles[0] ?? null;
    await Promise.all(handles.filter((handle) => handle !== chosen).map((handle) => handle.dispose()));
    return chosen;
  }

  private async withHandle<T>(
    action: string,
    fn: (handle: ElementHandle<Element>) => Promise<T>
  ): Promise<T> {
    let handle: ElementHandle<Element> | null = null;
    try {
      handle = await this.resolve();
      if (!handle) {
        throw new DriverError(`No element matches ${this.selector}`);
      }
      return await fn(handle);
    } catch (error) {
      throw translate(error, `${action} ${this.selector}`);
    } finally {
      await handle?.dispose();
    }
  }
}

type DownloadState = Protocol.Browser.DownloadProgressEvent["state"];

/**
 * A download reported over CDP. The browser writes it to the staging
 * directory under its GUID; saveAs moves it to the requested path.
 */
class CdpDownload implements DownloadHandle {
  private state: DownloadState | null = null;
  private waiters: Array<(state: DownloadState) => void> = [];

  constructor(
    private readonly guid: string,
    readonly suggestedFilename: string,
    private readonly stagingDir: string,
    private readonly timeoutMs: number,
    private readonly release: () => void
  ) {}

  private get stagedPath(): string {
    return path.join(this.stagingDir, this.guid);
  }

  /** Record a terminal progress state reported by the browser */
  settle(state: DownloadState): void {
    this.state = state;
    for (const waiter of this.waiters.splice(0)) waiter(state);
  }

  async saveAs(targetPath: string): Promise<void> {
    try {
      const state = await this.waitForEnd();
      if (state !== "completed") {
        throw new DriverError(`Download ${this.suggestedFilename} ended as ${state}`);
      }
      await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.promises.rename(this.stagedPath, targetPath);
    } catch (error) {
      throw translate(error, `saving download ${this.suggestedFilename}`);
    } finally {
      this.release();
    }
  }

  async delete(): Promise<void> {
    this.release();
    await fs.promises.rm(this.stagedPath, { force: true });
  }

  private waitForEnd(): Promise<DownloadState> {
    if (this.state) return Promise.resolve(this.state);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new TimeoutError(`Download ${this.suggestedFilename} did not finish within ${this.timeoutMs}ms`)),
        this.timeoutMs
      );
      this.waiters.push((state) => {
        clearTimeout(timer);
        resolve(state);
      });
    });
  }
}

/** The slice of a CDP session a download expectation listens on */
export interface DownloadEventSource {
  detach(): Promise<void>;
  once(
    event: "Browser.downloadWillBegin",
    handler: (event: Protocol.Browser.DownloadWillBeginEvent) => void
  ): unknown;
  on(
    event: "Browser.downloadProgress",
    handler: (event: Protocol.Browser.DownloadProgressEvent) => void
  ): unknown;
}

export function armCdpDownload(
  session: DownloadEventSource,
  stagingDir: string,
  timeoutMs: number
): DownloadExpectation {
  let released = false;
  let timer: NodeJS.Timeout | undefined;
  const release = (): void => {
    if (released) return;
    released = true;
    clearTimeout(timer);
    session.detach().catch((error: Error) => {
      log.debug({ error: error.message }, "CDP download session already detached");
    });
  };

  const download = new Promise<DownloadHandle>((resolve, reject) => {
    timer = setTimeout(() => {
      release();
      reject(new TimeoutError(`No download started within ${timeoutMs}ms`));
    }, timeoutMs);

    session.once("Browser.downloadWillBegin", (event: Protocol.Browser.DownloadWillBeginEvent) => {
      clearTimeout(timer);
      const handle = new CdpDownload(event.guid, event.suggestedFilename, stagingDir, timeoutMs, release);

      session.on("Browser.downloadProgress", (progress: Protocol.Browser.DownloadProgressEvent) => {
        if (progress.guid !== event.guid || progress.state === "inProgress") return;
        handle.settle(progress.state);
      });

      resolve(handle);
    });
  });

  return { download, cancel: release };
}

export class PuppeteerPage implements UiPage {
  constructor(
    private readonly page: Page,
    private readonly browser: Browser,
    private readonly downloadDir: string
  ) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
    } catch (error) {
      throw translate(error, `navigating to ${url}`);
    }
  }

  locator(selector: string): ElementLocator {
    return new PuppeteerLocator(this.page, selector);
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForNetworkIdle({ idleTime: NETWORK_IDLE_MS, timeout: timeoutMs });
    } catch (error) {
      throw translate(error, "waiting for network idle");
    }
  }

  async waitForDocumentReady(timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForFunction(() => document.readyState === "complete", {
        timeout: timeoutMs,
      });
    } catch (error) {
      throw translate(error, "waiting for document ready");
    }
  }

  async pressEnter(): Promise<void> {
    try {
      await this.page.keyboard.press("Enter");
    } catch (error) {
      throw translate(error, "pressing Enter");
    }
  }

  /**
   * Enable download events on the browser session, then hand back the
   * expectation. Resolves only once the browser acknowledged the
   * download behavior, so a click issued afterwards cannot be missed.
   */
  async armDownload(timeoutMs: number): Promise<DownloadExpectation> {
    const stagingDir = path.join(this.downloadDir, ".staging");
    try {
      await fs.promises.mkdir(stagingDir, { recursive: true });
      const session = await this.browser.target().createCDPSession();
      await session.send("Browser.setDownloadBehavior", {
        behavior: "allowAndName",
        downloadPath: stagingDir,
        eventsEnabled: true,
      });
      return armCdpDownload(session, stagingDir, timeoutMs);
    } catch (error) {
      throw translate(error, "arming download");
    }
  }

  async bringToFront(): Promise<void> {
    try {
      await this.page.bringToFront();
    } catch (error) {
      throw translate(error, "bringing page to front");
    }
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  async close(): Promise<void> {
    try {
      await this.page.close();
    } catch (error) {
      throw translate(error, "closing page");
    }
  }
}

export class PuppeteerContext implements UiContext {
  private readonly wrappers = new WeakMap<Page, PuppeteerPage>();

  constructor(private readonly browser: Browser, private readonly downloadDir: string) {}

  async pages(): Promise<UiPage[]> {
    try {
      const pages = await this.browser.pages();
      return pages.map((page) => this.wrap(page));
    } catch (error) {
      throw translate(error, "listing pages");
    }
  }

  async newPage(): Promise<UiPage> {
    try {
      return this.wrap(await this.browser.newPage());
    } catch (error) {
      throw translate(error, "opening page");
    }
  }

  async close(): Promise<void> {
    try {
      await this.browser.close();
    } catch (error) {
      throw translate(error, "closing browser");
    }
  }

  private wrap(page: Page): PuppeteerPage {
    let wrapper = this.wrappers.get(page);
    if (!wrapper) {
      wrapper = new PuppeteerPage(page, this.browser, this.downloadDir);
      this.wrappers.set(page, wrapper);
    }
    return wrapper;
  }
}
