/**
 * Report Navigator
 *
 * Walks the portal from the authenticated home page to the editor of
 * one saved query:
 * 1. Open the "Consulta" panel
 * 2. Open the "Consultas" tree item
 * 3. Wait for the saved-queries grid to list the report
 * 4. Double-click the report row to open its editor
 * 5. Wait for the editor's "Executar" and "Salvar" buttons
 *
 * Each step needs its element visible before interacting. A missing
 * element aborts the walk with the failing step logged; retrying is the
 * caller's decision.
 */
import { PortalSession } from "../session/portal-session";
import { ReadinessDetector, readinessSpec } from "../readiness/readiness-detector";
import { ElementLocator } from "../../shared/types/driver.types";
import { NavigationStepError, errorMessage } from "../../shared/errors/scrape.errors";
import { PORTAL } from "../../config/constants";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("navigator");

async function requireVisible(step: string, element: ElementLocator, timeoutMs: number): Promise<void> {
  if (!(await element.isVisible(timeoutMs))) {
    throw new NavigationStepError(step, `${step}: ${element.selector} not visible`);
  }
}

/**
 * Open the editor of `reportName`.
 * @returns true once the editor's action buttons are available
 */
export async function openReportEditor(
  session: PortalSession,
  readiness: ReadinessDetector,
  reportName: string
): Promise<boolean> {
  const { elementTimeoutMs, pageTimeoutMs } = session.limits;
  log.info({ reportName }, "Navigating to saved query");

  try {
    const page = session.currentPage;

    const menu = page.locator(PORTAL.SELECTORS.MENU_QUERIES);
    await requireVisible("queries-menu", menu, elementTimeoutMs);
    await menu.click();
    log.info("Queries menu opened");

    const submenu = page.locator(PORTAL.SELECTORS.SUBMENU_QUERIES);
    await requireVisible("queries-item", submenu, elementTimeoutMs);
    await submenu.click();
    log.info("Queries item opened");

    const rowSelector = PORTAL.reportRow(reportName);
    const listed = await readiness.wait(
      page,
      readinessSpec("Saved queries list", { timeoutMs: pageTimeoutMs, checkElements: [rowSelector] })
    );
    if (!listed) {
      throw new NavigationStepError("report-list", `Report ${reportName} not listed`);
    }

    const row = page.locator(rowSelector);
    await requireVisible("report-row", row, elementTimeoutMs);
    await row.dblclick();
    log.info({ reportName }, "Report opened for editing");

    const editorReady = await readiness.wait(
      page,
      readinessSpec("Query editor", {
        timeoutMs: pageTimeoutMs,
        checkElements: [PORTAL.SELECTORS.EXECUTE_BUTTON, PORTAL.SELECTORS.SAVE_BUTTON],
      })
    );
    if (!editorReady) {
      throw new NavigationStepError("query-editor", "Editor actions not available");
    }

    return true;
  } catch (error) {
    const step = error instanceof NavigationStepError ? error.step : "unexpected";
    log.error({ reportName, step, error: errorMessage(error) }, "Navigation to saved query failed");
    return false;
  }
}
