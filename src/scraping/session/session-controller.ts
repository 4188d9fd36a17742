/**
 * Report Session Controller
 *
 * One complete run against the portal:
 *   login → navigate → adjust date and execute → poll completion → export
 *
 * Stages run strictly in order and the first failure ends the run.
 * execute() never throws; every outcome is reported as a SessionOutcome.
 * The browser context is closed on every path.
 */
import moment from "moment-timezone";
import { v4 as uuidv4 } from "uuid";
import { AppConfig } from "../../config";
import { UiContext, UiContextFactory } from "../../shared/types/driver.types";
import { SessionLimits, SessionOutcome } from "../../shared/types/session.types";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { secondsSince } from "../../shared/utils/date";
import { CaptchaOracle } from "../captcha/captcha-solver";
import { ReadinessDetector } from "../readiness/readiness-detector";
import { LoginFlow } from "../login/login-flow";
import { CaptchaRotationDetector, LoginSuccessDetector } from "../login/success-detector";
import { openReportEditor } from "../navigators/report-navigator";
import { adjustDateAndExecute } from "../navigators/query-executor";
import { CompletionPoller } from "../polling/completion-poller";
import { exportReport } from "../downloaders/report-exporter";
import { PortalSession } from "./portal-session";
import { componentLogger } from "../../monitoring/logger";

const FAILED: SessionOutcome = Object.freeze({ success: false, artifactPath: null });

/** Fixed pauses and the clock, overridable for tests */
export interface ControllerTimings {
  loginSettleMs?: number;
  editorOpenMs?: number;
  saveSettleMs?: number;
  now?: () => moment.Moment;
}

export interface ControllerDeps {
  contextFactory: UiContextFactory;
  oracle: CaptchaOracle;
  readiness?: ReadinessDetector;
  successDetector?: LoginSuccessDetector;
  timings?: ControllerTimings;
}

export function sessionLimitsFrom(config: AppConfig): SessionLimits {
  return {
    maxCaptchaRetries: config.maxCaptchaRetries,
    pageTimeoutMs: config.pageTimeoutMs,
    elementTimeoutMs: config.elementTimeoutMs,
    newWindowTimeoutMs: config.newWindowTimeoutMs,
    completionTimeoutMs: config.completionTimeoutMs,
    pollUnitMs: config.pollUnitMs,
    exportTimeoutMs: config.exportTimeoutMs,
  };
}

export class ReportSessionController {
  private readonly readiness: ReadinessDetector;
  private readonly successDetector: LoginSuccessDetector;
  private readonly poller = new CompletionPoller();

  constructor(
    private readonly config: AppConfig,
    private readonly deps: ControllerDeps
  ) {
    this.readiness = deps.readiness ?? new ReadinessDetector();
    this.successDetector = deps.successDetector ?? new CaptchaRotationDetector(this.readiness);
  }

  async execute(): Promise<SessionOutcome> {
    const runId = uuidv4();
    const log = componentLogger("controller").child({ runId });
    const startTime = Date.now();
    const timings = this.deps.timings ?? {};
    let context: UiContext | null = null;

    log.info({ report: this.config.reportName }, "Session started");

    try {
      context = await this.deps.contextFactory();
      const session = await PortalSession.open(
        context,
        { username: this.config.portalUsername, password: this.config.portalPassword },
        sessionLimitsFrom(this.config),
        this.config.downloadDir
      );

      const login = new LoginFlow({
        loginUrl: this.config.portalLoginUrl,
        oracle: this.deps.oracle,
        readiness: this.readiness,
        successDetector: this.successDetector,
        settleMs: timings.loginSettleMs,
      });
      if (!(await login.run(session))) {
        log.error({ attempts: session.loginAttemptCount }, "Login failed");
        return FAILED;
      }

      if (!(await openReportEditor(session, this.readiness, this.config.reportName))) {
        log.error("Navigation failed");
        return FAILED;
      }

      const executed = await adjustDateAndExecute(session, this.readiness, {
        timezone: this.config.portalTimezone,
        now: timings.now?.(),
        editorOpenMs: timings.editorOpenMs,
        saveSettleMs: timings.saveSettleMs,
      });
      if (!executed) {
        log.error("Date adjustment or execution failed");
        return FAILED;
      }

      const completion = await this.poller.waitForCompletion(session.currentPage, {
        timeoutMs: session.limits.completionTimeoutMs,
        pollUnitMs: session.limits.pollUnitMs,
      });
      if (!completion.completed) {
        log.error({ status: completion.status.classification }, "Query did not complete");
        return FAILED;
      }

      const artifact = await exportReport(session);
      if (!artifact) {
        log.error("Export produced no valid artifact");
        return FAILED;
      }

      log.info(
        { path: artifact.path, size: artifact.size, seconds: secondsSince(startTime) },
        "Session succeeded"
      );
      return { success: true, artifactPath: artifact.path };
    } catch (error) {
      log.error({ error: errorMessage(error) }, "Session aborted");
      return FAILED;
    } finally {
      if (context) {
        try {
          await context.close();
          log.info("Browser context closed");
        } catch (error) {
          log.warn({ error: errorMessage(error) }, "Failed to close browser context");
        }
      }
    }
  }
}
