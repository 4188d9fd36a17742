/**
 * Login State Machine
 *
 * Init → BrowserReady → ElementsLocated → CaptchaCaptured → FormSubmitted
 *      → VerifyingOutcome → Success | RetryOrFail
 *
 * Every attempt starts again at ElementsLocated with a freshly captured
 * captcha; solutions are never reused. Attempts are bounded by the
 * session's maxCaptchaRetries and the flow never raises: any failure
 * ends the attempt, and running out of attempts ends the login.
 */
import { PortalSession } from "../session/portal-session";
import { ReadinessDetector, readinessSpec } from "../readiness/readiness-detector";
import { LoginSuccessDetector } from "./success-detector";
import { CaptchaOracle } from "../captcha/captcha-solver";
import { ElementLocator, UiPage } from "../../shared/types/driver.types";
import { LoginAttempt, LoginState } from "../../shared/types/session.types";
import { CaptchaImageCaptureError } from "../../shared/errors/captcha.errors";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { PORTAL, WAITS } from "../../config/constants";
import { sleep } from "../../shared/utils/retry";
import { withTempFile } from "../../shared/utils/temp-file";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("login");

interface LoginElements {
  username: ElementLocator;
  password: ElementLocator;
  captchaImage: ElementLocator;
  captchaInput: ElementLocator;
}

export interface LoginFlowDeps {
  loginUrl: string;
  oracle: CaptchaOracle;
  readiness: ReadinessDetector;
  successDetector: LoginSuccessDetector;
  /** Pause between submitting and verifying */
  settleMs?: number;
}

export class LoginFlow {
  private state: LoginState = "Init";
  private readonly settleMs: number;

  constructor(private readonly deps: LoginFlowDeps) {
    this.settleMs = deps.settleMs ?? WAITS.LOGIN_SETTLE_MS;
  }

  get currentState(): LoginState {
    return this.state;
  }

  async run(session: PortalSession): Promise<boolean> {
    try {
      await this.openLoginPage(session);
    } catch (error) {
      log.error({ error: errorMessage(error) }, "Could not open the login page");
      this.transition("RetryOrFail");
      return false;
    }

    const maxAttempts = session.limits.maxCaptchaRetries;
    while (session.loginAttemptCount < maxAttempts) {
      const index = session.beginLoginAttempt();
      log.info({ attempt: index, maxAttempts }, "Login attempt");

      if (await this.attempt(session, index)) {
        this.transition("Success", index);
        return true;
      }

      this.transition("RetryOrFail", index);
      log.warn({ attempt: index, maxAttempts }, "Login attempt failed");
    }

    log.error({ maxAttempts }, "All login attempts failed");
    return false;
  }

  private async openLoginPage(session: PortalSession): Promise<void> {
    const page = session.currentPage;
    await page.goto(this.deps.loginUrl, session.limits.pageTimeoutMs);
    this.transition("BrowserReady");

    // Element location below is the authoritative check for this page
    await this.deps.readiness.wait(page, readinessSpec("Login page", {
      timeoutMs: session.limits.pageTimeoutMs,
    }));
  }

  private async attempt(session: PortalSession, index: number): Promise<boolean> {
    const page = session.currentPage;
    const attempt: LoginAttempt = { index, initialCaptchaSrc: null };

    try {
      const elements = await this.locateElements(page, session.limits.elementTimeoutMs);
      this.transition("ElementsLocated", index);
      attempt.initialCaptchaSrc = await elements.captchaImage.getAttribute("src");

      const solution = await this.solveCaptcha(elements.captchaImage, attempt);
      if (!solution) {
        log.warn({ attempt: index }, "No captcha solution");
        return false;
      }

      // Fixed order; the captcha goes in last so client-side validation
      // sees a complete form
      await elements.username.fill(session.credentials.username);
      await elements.password.fill(session.credentials.password);
      await elements.captchaInput.fill(solution);
      await page.pressEnter();
      this.transition("FormSubmitted", index);

      await sleep(this.settleMs);

      this.transition("VerifyingOutcome", index);
      return await this.deps.successDetector.verify(session, attempt);
    } catch (error) {
      log.warn(
        { attempt: index, state: this.state, error: errorMessage(error) },
        "Login attempt aborted"
      );
      return false;
    }
  }

  /**
   * Wait for all four form elements together.
   */
  private async locateElements(page: UiPage, timeoutMs: number): Promise<LoginElements> {
    const elements: LoginElements = {
      username: page.locator(PORTAL.SELECTORS.USERNAME_INPUT),
      password: page.locator(PORTAL.SELECTORS.PASSWORD_INPUT),
      captchaImage: page.locator(PORTAL.SELECTORS.CAPTCHA_IMAGE),
      captchaInput: page.locator(PORTAL.SELECTORS.CAPTCHA_INPUT),
    };

    await Promise.all(
      Object.values(elements).map((element) => element.waitForVisible(timeoutMs))
    );

    log.debug("All login elements located");
    return elements;
  }

  /**
   * Capture the captcha into a temp file that is removed on every path,
   * then hand the bytes to the oracle.
   */
  private async solveCaptcha(captchaImage: ElementLocator, attempt: LoginAttempt): Promise<string | null> {
    return withTempFile(".png", async (imagePath) => {
      attempt.captchaImagePath = imagePath;

      let image: Buffer;
      try {
        image = await captchaImage.screenshot(imagePath);
      } catch (error) {
        throw new CaptchaImageCaptureError(errorMessage(error));
      }
      this.transition("CaptchaCaptured", attempt.index);

      try {
        const solution = await this.deps.oracle.solve(image);
        attempt.solution = solution?.code;
        return solution?.code ?? null;
      } catch (error) {
        log.warn({ attempt: attempt.index, error: errorMessage(error) }, "Captcha oracle failed");
        return null;
      }
    });
  }

  private transition(next: LoginState, attempt?: number): void {
    log.debug({ from: this.state, to: next, attempt }, "Login state");
    this.state = next;
  }
}
