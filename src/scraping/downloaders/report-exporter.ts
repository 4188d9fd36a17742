/**
 * Report Exporter
 *
 * Clicks "Exportar" with a download expectation armed beforehand, saves
 * the transfer under the name the portal suggests and validates it.
 * A rejected file is removed from disk.
 */
import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { PortalSession } from "../session/portal-session";
import { DownloadExpectation, DownloadHandle } from "../../shared/types/driver.types";
import { DownloadArtifact } from "../../shared/types/session.types";
import { NavigationStepError, errorMessage } from "../../shared/errors/scrape.errors";
import { validateArtifact } from "../../processing/artifact-validator";
import { removeFile } from "../../shared/utils/temp-file";
import { PORTAL, WAITS } from "../../config/constants";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("export");

/** Keep only the file name part of what the portal suggests */
export function safeFilename(suggested: string): string {
  const base = path.basename(suggested.replace(/\\/g, "/")).trim();
  return base && base !== "." && base !== ".." ? base : `report-${uuidv4()}.xlsx`;
}

async function release(download: DownloadHandle): Promise<void> {
  try {
    await download.delete();
  } catch (error) {
    log.warn({ error: errorMessage(error) }, "Failed to release download");
  }
}

/**
 * Export the current results.
 * @returns the validated artifact, or null when nothing valid was saved
 */
export async function exportReport(session: PortalSession): Promise<DownloadArtifact | null> {
  const page = session.currentPage;
  let expectation: DownloadExpectation | null = null;
  let download: DownloadHandle | null = null;
  let targetPath: string | null = null;

  try {
    const exportButton = page.locator(PORTAL.SELECTORS.EXPORT_BUTTON);
    if (!(await exportButton.isVisible(WAITS.EXPORT_BUTTON_TIMEOUT_MS))) {
      throw new NavigationStepError("export-button", "Export button not visible");
    }

    await fs.promises.mkdir(session.downloadDir, { recursive: true });

    expectation = await page.armDownload(session.limits.exportTimeoutMs);
    log.info("Starting export");
    const [handle] = await Promise.all([expectation.download, exportButton.click()]);
    download = handle;

    targetPath = path.join(session.downloadDir, safeFilename(handle.suggestedFilename));
    await handle.saveAs(targetPath);
    log.info({ path: targetPath }, "Download saved");

    const { size, formatClass, validation } = await validateArtifact(targetPath);
    if (!validation.valid) {
      await removeFile(targetPath);
      await release(handle);
      return null;
    }

    return {
      path: targetPath,
      size,
      suggestedName: handle.suggestedFilename,
      formatClass,
      validation,
    };
  } catch (error) {
    log.error({ error: errorMessage(error) }, "Export failed");
    if (targetPath) await removeFile(targetPath);
    if (download) {
      await release(download);
    } else {
      expectation?.cancel();
    }
    return null;
  }
}
