/**
 * Query Executor
 *
 * Moves the report's closing-date filter to yesterday 00:00, saves the
 * query and runs it.
 *
 * The date cell has no stable id; it is found through the row whose
 * label reads "Data Encerramento". Clicking the cell opens an inline
 * editor whose input takes focus. The edit counts as applied when the
 * cell text changed or already shows the new value.
 */
import moment from "moment-timezone";
import { PortalSession } from "../session/portal-session";
import { ReadinessDetector, readinessSpec } from "../readiness/readiness-detector";
import { NavigationStepError, errorMessage } from "../../shared/errors/scrape.errors";
import { PORTAL, WAITS } from "../../config/constants";
import { nowIn, yesterdayAtMidnight } from "../../shared/utils/date";
import { sleep } from "../../shared/utils/retry";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("query");

export interface QueryExecutionOptions {
  timezone: string;
  /** Clock override */
  now?: moment.Moment;
  editorOpenMs?: number;
  saveSettleMs?: number;
}

export async function adjustDateAndExecute(
  session: PortalSession,
  readiness: ReadinessDetector,
  options: QueryExecutionOptions
): Promise<boolean> {
  const { elementTimeoutMs, pageTimeoutMs } = session.limits;
  const page = session.currentPage;

  try {
    const dateField = page.locator(PORTAL.SELECTORS.CLOSING_DATE_FIELD);
    if (!(await dateField.isVisible(elementTimeoutMs))) {
      throw new NavigationStepError("date-field", "Closing date field not found");
    }

    const before = (await dateField.textContent())?.trim() ?? "";
    await dateField.click();
    await sleep(options.editorOpenMs ?? WAITS.EDITOR_OPEN_MS);

    const input = page.locator(PORTAL.SELECTORS.FOCUSED_INPUT);
    if (!(await input.isVisible(WAITS.FOCUSED_INPUT_TIMEOUT_MS))) {
      throw new NavigationStepError("date-editor", "No focused input after opening the editor");
    }

    const newDate = yesterdayAtMidnight(options.timezone, options.now ?? nowIn(options.timezone));
    log.info({ before, after: newDate }, "Changing closing date");

    await input.click({ force: true });
    await input.fill("");
    await input.fill(newDate);
    await page.pressEnter();

    const after = (await dateField.textContent())?.trim() ?? "";
    if (after === before && after !== newDate) {
      throw new NavigationStepError("date-confirm", `Closing date still reads "${after}"`);
    }
    log.info({ closingDate: after }, "Closing date changed");

    await page.locator(PORTAL.SELECTORS.SAVE_BUTTON).click();
    log.info("Query saved");
    await sleep(options.saveSettleMs ?? WAITS.SAVE_SETTLE_MS);

    await page.locator(PORTAL.SELECTORS.EXECUTE_BUTTON).click();
    log.info("Query executing");

    return await readiness.wait(
      page,
      readinessSpec("Query results", {
        timeoutMs: pageTimeoutMs,
        checkElements: [PORTAL.SELECTORS.EXPORT_BUTTON],
      })
    );
  } catch (error) {
    const step = error instanceof NavigationStepError ? error.step : "unexpected";
    log.error({ step, error: errorMessage(error) }, "Adjusting and executing the query failed");
    return false;
  }
}
