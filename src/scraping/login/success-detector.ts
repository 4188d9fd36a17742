/**
 * Login Success Detection
 *
 * The portal gives no explicit error for a wrong captcha: it silently
 * swaps the captcha image. A correct login instead opens the application
 * in a new window. Detection is a pluggable strategy so the login state
 * machine does not depend on these heuristics.
 */
import { PortalSession } from "../session/portal-session";
import { ReadinessDetector, readinessSpec } from "../readiness/readiness-detector";
import { LoginAttempt } from "../../shared/types/session.types";
import { PORTAL, WAITS } from "../../config/constants";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("login");

export interface LoginSuccessDetector {
  readonly name: string;
  /** Decide whether the submitted attempt logged in; may switch the session's page */
  verify(session: PortalSession, attempt: LoginAttempt): Promise<boolean>;
}

export interface CaptchaRotationOptions {
  captchaRecheckTimeoutMs: number;
  homeReadinessTimeoutMs: number;
}

/**
 * Default heuristic, checked in order:
 * 1. the captcha `src` changed after submit → the solution was rejected;
 *    an unchanged or vanished captcha is inconclusive;
 * 2. a new window opened → adopt it and wait for the welcome marker.
 *
 * A portal that re-renders the same captcha after a correct solve falls
 * through to step 2, so an unchanged image is never taken as success.
 */
export class CaptchaRotationDetector implements LoginSuccessDetector {
  readonly name = "captcha-rotation";
  private options: CaptchaRotationOptions;

  constructor(
    private readonly readiness: ReadinessDetector,
    options: Partial<CaptchaRotationOptions> = {}
  ) {
    this.options = {
      captchaRecheckTimeoutMs: WAITS.CAPTCHA_RECHECK_TIMEOUT_MS,
      homeReadinessTimeoutMs: WAITS.POST_LOGIN_READINESS_TIMEOUT_MS,
      ...options,
    };
  }

  async verify(session: PortalSession, attempt: LoginAttempt): Promise<boolean> {
    if (attempt.initialCaptchaSrc && (await this.captchaRotated(session, attempt.initialCaptchaSrc))) {
      log.warn({ attempt: attempt.index }, "Captcha changed, previous solution was rejected");
      return false;
    }

    const home = await session.waitForNewWindow(session.limits.newWindowTimeoutMs);
    if (!home) return false;

    const ready = await this.readiness.wait(
      home,
      readinessSpec("Home page after login", {
        timeoutMs: this.options.homeReadinessTimeoutMs,
        checkElements: [PORTAL.SELECTORS.WELCOME_MARKER],
      })
    );

    if (ready) {
      log.info({ attempt: attempt.index }, "Login succeeded");
    }
    return ready;
  }

  private async captchaRotated(session: PortalSession, initialSrc: string): Promise<boolean> {
    try {
      const captcha = session.currentPage.locator(PORTAL.SELECTORS.CAPTCHA_IMAGE);
      if (!(await captcha.isVisible(this.options.captchaRecheckTimeoutMs))) return false;
      const currentSrc = await captcha.getAttribute("src");
      return currentSrc !== initialSrc;
    } catch (error) {
      // The login page may already be gone after a successful submit
      log.debug({ error: errorMessage(error) }, "Captcha re-check inconclusive");
      return false;
    }
  }
}
