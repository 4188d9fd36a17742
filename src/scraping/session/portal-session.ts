/**
 * Portal Session
 *
 * State of one controller run: credentials, the browser context, the
 * single current page and the login attempt counter.
 *
 * Exactly one page is current at any time. It is replaced only through
 * adoptPage(), which closes the previous page before the new one takes
 * its place. Stages run strictly one after another, so nothing else
 * touches the page while a switch is in progress.
 */
import { UiContext, UiPage } from "../../shared/types/driver.types";
import { Credentials, SessionLimits } from "../../shared/types/session.types";
import { VerificationFailure, errorMessage } from "../../shared/errors/scrape.errors";
import { WAITS } from "../../config/constants";
import { sleep } from "../../shared/utils/retry";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("session");

export class PortalSession {
  private page: UiPage;
  private loginAttempts = 0;

  constructor(
    readonly context: UiContext,
    initialPage: UiPage,
    readonly credentials: Credentials,
    readonly limits: SessionLimits,
    readonly downloadDir: string
  ) {
    this.page = initialPage;
  }

  /**
   * Reuse the page a persistent context opens with, or open one.
   */
  static async open(
    context: UiContext,
    credentials: Credentials,
    limits: SessionLimits,
    downloadDir: string
  ): Promise<PortalSession> {
    const pages = await context.pages();
    const page = pages.find((candidate) => !candidate.isClosed()) ?? (await context.newPage());
    return new PortalSession(context, page, credentials, limits, downloadDir);
  }

  get currentPage(): UiPage {
    return this.page;
  }

  get loginAttemptCount(): number {
    return this.loginAttempts;
  }

  /**
   * Start the next login attempt and return its 1-based index.
   * @throws VerificationFailure once the configured maximum is reached
   */
  beginLoginAttempt(): number {
    if (this.loginAttempts >= this.limits.maxCaptchaRetries) {
      throw new VerificationFailure(
        `Login attempts exhausted (${this.limits.maxCaptchaRetries})`
      );
    }
    this.loginAttempts += 1;
    return this.loginAttempts;
  }

  /**
   * Make `next` the current page: close the previous one first (unless
   * the portal already did), then assign and focus the new one.
   */
  async adoptPage(next: UiPage): Promise<void> {
    if (next === this.page) return;

    const previous = this.page;
    if (!previous.isClosed()) {
      await previous.close();
      log.info("Previous page closed");
    }

    this.page = next;
    await next.bringToFront();
  }

  /**
   * Poll the context for a window other than the current one and adopt
   * it. Returns the new page, or null when none appears in time.
   */
  async waitForNewWindow(
    timeoutMs: number,
    pollMs: number = WAITS.NEW_WINDOW_POLL_MS
  ): Promise<UiPage | null> {
    log.info({ timeoutMs }, "Waiting for a new window");
    const startTime = Date.now();

    while (Date.now() - startTime < timeoutMs) {
      try {
        const pages = await this.context.pages();
        const fresh = pages.find((candidate) => candidate !== this.page && !candidate.isClosed());

        if (fresh) {
          log.info("New window found");
          await this.adoptPage(fresh);
          return fresh;
        }
      } catch (error) {
        log.warn({ error: errorMessage(error) }, "Failed to inspect open windows");
        return null;
      }

      await sleep(pollMs);
    }

    log.warn({ timeoutMs }, "No new window detected");
    return null;
  }
}
