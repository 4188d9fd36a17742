/**
 * Remote UI Driver Types
 *
 * The narrow capability set the session controller drives the portal
 * through. The Puppeteer binding lives in scraping/driver; tests use an
 * in-process fake. Nothing outside scraping/driver and scraping/browser
 * touches Puppeteer objects directly.
 */

/** A handle to one remote UI element, resolved lazily by selector */
export interface ElementLocator {
  readonly selector: string;
  /** Resolve once the element is visible, reject with TimeoutError otherwise */
  waitForVisible(timeoutMs: number): Promise<void>;
  /** Visibility now, or within `timeoutMs` when given. Never throws. */
  isVisible(timeoutMs?: number): Promise<boolean>;
  /** Number of elements currently matching the selector */
  count(): Promise<number>;
  click(options?: { force?: boolean }): Promise<void>;
  dblclick(): Promise<void>;
  fill(text: string): Promise<void>;
  textContent(): Promise<string | null>;
  getAttribute(name: string): Promise<string | null>;
  /** PNG bytes of the element; also written to `path` when given */
  screenshot(path?: string): Promise<Buffer>;
}

/** A browser-reported file transfer */
export interface DownloadHandle {
  readonly suggestedFilename: string;
  /** Wait for the transfer to complete and move the file to `targetPath` */
  saveAs(targetPath: string): Promise<void>;
  /** Release the transfer and remove whatever it left on disk */
  delete(): Promise<void>;
}

/**
 * An armed download expectation. Arm before the action that triggers the
 * download; `download` settles with the next transfer or a TimeoutError.
 */
export interface DownloadExpectation {
  readonly download: Promise<DownloadHandle>;
  /** Stop waiting for a transfer that will not come; idempotent */
  cancel(): void;
}

export interface UiPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  locator(selector: string): ElementLocator;
  waitForNetworkIdle(timeoutMs: number): Promise<void>;
  waitForDocumentReady(timeoutMs: number): Promise<void>;
  pressEnter(): Promise<void>;
  armDownload(timeoutMs: number): Promise<DownloadExpectation>;
  bringToFront(): Promise<void>;
  isClosed(): boolean;
  close(): Promise<void>;
}

/** One browser context: every window the portal opens lives here */
export interface UiContext {
  /** Open pages; the same underlying page always maps to the same object */
  pages(): Promise<UiPage[]>;
  newPage(): Promise<UiPage>;
  close(): Promise<void>;
}

/** Creates the context a session runs in */
export type UiContextFactory = () => Promise<UiContext>;
