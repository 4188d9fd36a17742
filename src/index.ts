/**
 * Entry Point — portal-report-scraper
 *
 * Runs the report session once (RUN_MODE=once, exit code 0 on success,
 * 1 on failure) or keeps running it on REPORT_CRON (RUN_MODE=cron).
 */
import config from "./config";
import { ScheduledTask } from "node-cron";
import { CaptchaSolver } from "./scraping/captcha/captcha-solver";
import { TwoCaptchaClient } from "./scraping/captcha/twocaptcha.client";
import { CapSolverClient } from "./scraping/captcha/capsolver.client";
import { launchPortalContext, launchSettingsFrom } from "./scraping/browser/browser-launcher";
import { ReportSessionController } from "./scraping/session/session-controller";
import { runReport, startScheduler } from "./scheduler/scheduler.service";
import { errorMessage } from "./shared/errors/scrape.errors";
import { logger } from "./monitoring/logger";

let scheduledTask: ScheduledTask | null = null;

function buildController(): ReportSessionController {
  const oracle = new CaptchaSolver([
    new TwoCaptchaClient(config.twoCaptchaApiKey),
    new CapSolverClient(config.capSolverApiKey),
  ]);
  if (!oracle.isConfigured()) {
    logger.warn("No captcha service API key configured — login will fail");
  }

  const settings = launchSettingsFrom(config);
  return new ReportSessionController(config, {
    contextFactory: () => launchPortalContext(settings),
    oracle,
  });
}

async function main(): Promise<void> {
  logger.info(
    { env: config.env, runMode: config.runMode, report: config.reportName },
    "Starting portal-report-scraper"
  );

  if (!config.portalUsername || !config.portalPassword) {
    logger.fatal("PORTAL_USERNAME and PORTAL_PASSWORD are required — aborting startup");
    process.exit(1);
  }

  const controller = buildController();
  const run = () => runReport(controller, { attempts: config.runAttempts });

  if (config.runMode === "cron") {
    scheduledTask = startScheduler(config.reportCron, async () => {
      const outcome = await run();
      logger.info({ ...outcome }, "Scheduled report run finished");
    });
    logger.info({ cron: config.reportCron }, "Scheduler started — waiting for next cycle");
    return;
  }

  const outcome = await run();
  if (outcome.success) {
    logger.info({ artifactPath: outcome.artifactPath }, "Report exported");
    process.exit(0);
  }
  logger.error("Report run failed");
  process.exit(1);
}

// --- Graceful Shutdown ---
function shutdown(signal: string): void {
  logger.info({ signal }, "Shutdown signal received");
  scheduledTask?.stop();
  process.exit(0);
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to start service");
  process.exit(1);
});
