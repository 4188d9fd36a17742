/**
 * Scheduler Service
 *
 * Runs report sessions on a node-cron expression (default: daily at
 * 06:00). A cycle that fires while the previous one is still running is
 * skipped.
 */
import cron, { ScheduledTask } from "node-cron";
import { ReportSessionController } from "../scraping/session/session-controller";
import { SessionOutcome } from "../shared/types/session.types";
import { retryWithBackoff } from "../shared/utils/retry";
import { errorMessage } from "../shared/errors/scrape.errors";
import { RETRY_CONFIG } from "../config/constants";
import { logger } from "../monitoring/logger";

export interface RunOptions {
  attempts: number;
  initialDelayMs?: number;
}

/**
 * Run the controller, repeating failed sessions with exponential backoff.
 */
export async function runReport(
  controller: Pick<ReportSessionController, "execute">,
  options: RunOptions
): Promise<SessionOutcome> {
  return retryWithBackoff((attempt) => {
    logger.info({ attempt, maxAttempts: options.attempts }, "Report run started");
    return controller.execute();
  }, {
    maxAttempts: options.attempts,
    initialDelayMs: options.initialDelayMs ?? RETRY_CONFIG.INITIAL_DELAY_MS,
    backoffFactor: RETRY_CONFIG.BACKOFF_FACTOR,
    label: "Report run",
    isFailure: (outcome) => !outcome.success,
  });
}

/**
 * Wrap a job so that calls made while it is running are dropped.
 */
export function skipOverlapping(job: () => Promise<unknown>): () => Promise<void> {
  let isRunning = false;

  return async () => {
    if (isRunning) {
      logger.warn("Scheduler cycle already in progress — skipping");
      return;
    }

    isRunning = true;
    const startTime = Date.now();

    try {
      logger.info("Scheduler cycle started");
      await job();
      logger.info({ durationMs: Date.now() - startTime }, "Scheduler cycle completed");
    } catch (error) {
      logger.error(
        { error: errorMessage(error), durationMs: Date.now() - startTime },
        "Scheduler cycle failed"
      );
    } finally {
      isRunning = false;
    }
  };
}

/**
 * Start the cron job.
 * @throws Error if the expression is not a valid cron expression
 */
export function startScheduler(cronExpression: string, job: () => Promise<unknown>): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression }, "Starting scheduler");
  const cycle = skipOverlapping(job);

  return cron.schedule(cronExpression, () => {
    void cycle();
  });
}
