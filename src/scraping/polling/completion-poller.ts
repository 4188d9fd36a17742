/**
 * Completion Poller
 *
 * Samples the result grid's paging display ("A visualizar 1 de 500")
 * until it reports a positive total or the budget runs out. The first
 * ten ticks sleep one poll unit, later ticks two.
 */
import { UiPage } from "../../shared/types/driver.types";
import { CompletionResult, ProgressClassification, ProgressStatus } from "../../shared/types/session.types";
import { PORTAL, POLLING } from "../../config/constants";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { sleep } from "../../shared/utils/retry";
import { secondsSince } from "../../shared/utils/date";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("poller");

/** Classifications that repeat every tick while the query is still running */
const ROUTINE: ReadonlySet<ProgressClassification> = new Set(["indicator_not_found"]);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Classify the indicator text. Pure; `null` means the indicator was absent.
 */
export function classifyProgressText(
  text: string | null,
  marker: string = PORTAL.PROGRESS_MARKER
): ProgressStatus {
  const rawText = text?.trim() ?? "";
  if (!rawText) {
    return { classification: "indicator_not_found", rawText: text, total: null };
  }

  if (!rawText.includes(marker) || !/\d/.test(rawText)) {
    return { classification: "invalid_format", rawText, total: null };
  }

  const match = new RegExp(`${escapeRegExp(marker)}\\s+(\\d+)`).exec(rawText);
  if (!match) {
    return { classification: "no_total_found", rawText, total: null };
  }

  const total = Number.parseInt(match[1], 10);
  return { classification: total > 0 ? "complete" : "zero_total", rawText, total };
}

/** Poll units to sleep after the given 1-based tick */
export function pollIntervalUnits(tick: number): number {
  return tick <= POLLING.FAST_TICKS ? POLLING.FAST_INTERVAL_UNITS : POLLING.SLOW_INTERVAL_UNITS;
}

export interface CompletionPollOptions {
  timeoutMs: number;
  pollUnitMs: number;
}

export class CompletionPoller {
  async waitForCompletion(page: UiPage, options: CompletionPollOptions): Promise<CompletionResult> {
    log.info({ timeoutMs: options.timeoutMs }, "Waiting for query completion");
    const startTime = Date.now();
    let previous: ProgressClassification | null = null;
    let status: ProgressStatus = { classification: "indicator_not_found", rawText: null, total: null };
    let ticks = 0;

    while (Date.now() - startTime < options.timeoutMs) {
      ticks += 1;
      status = await this.sample(page);

      if (status.classification === "complete") {
        log.info(
          { total: status.total, ticks, seconds: secondsSince(startTime) },
          "Query completed"
        );
        return { completed: true, status, ticks, elapsedMs: Date.now() - startTime };
      }

      if (status.classification !== previous && !ROUTINE.has(status.classification)) {
        if (status.classification === "error") {
          log.warn({ tick: ticks, error: status.detail }, "Progress check failed");
        } else {
          log.debug({ tick: ticks, status: status.classification, text: status.rawText }, "Progress status");
        }
      }
      previous = status.classification;

      await sleep(pollIntervalUnits(ticks) * options.pollUnitMs);
    }

    log.error(
      { timeoutMs: options.timeoutMs, ticks, lastStatus: status.classification },
      "Query did not complete in time"
    );
    return { completed: false, status, ticks, elapsedMs: Date.now() - startTime };
  }

  private async sample(page: UiPage): Promise<ProgressStatus> {
    try {
      const indicator = page.locator(PORTAL.SELECTORS.PROGRESS_INDICATOR);
      if (!(await indicator.isVisible())) {
        return { classification: "indicator_not_found", rawText: null, total: null };
      }
      return classifyProgressText(await indicator.textContent());
    } catch (error) {
      return { classification: "error", rawText: null, total: null, detail: errorMessage(error) };
    }
  }
}
