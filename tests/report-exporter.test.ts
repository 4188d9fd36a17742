import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { exportReport, safeFilename } from "../src/scraping/downloaders/report-exporter";
import { PortalSession } from "../src/scraping/session/portal-session";
import { PORTAL } from "../src/config/constants";
import { FakeContext, FakeDownload, FakePage } from "./support/fake-portal";
import { workbookBuffer } from "./support/portal-scenario";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

async function sessionOn(page: FakePage): Promise<PortalSession> {
  const downloadDir = await mkdtemp(join(tmpdir(), "report-exporter-"));
  tempDirs.push(downloadDir);
  return PortalSession.open(
    new FakeContext(page),
    { username: "test-user", password: "test-secret" },
    {
      maxCaptchaRetries: 1,
      pageTimeoutMs: 500,
      elementTimeoutMs: 100,
      newWindowTimeoutMs: 100,
      completionTimeoutMs: 500,
      pollUnitMs: 1,
      exportTimeoutMs: 100,
    },
    downloadDir
  );
}

function pageExporting(download?: FakeDownload): FakePage {
  const page = new FakePage("results");
  page.element(PORTAL.SELECTORS.EXPORT_BUTTON, {
    onClick: () => {
      if (download) page.startDownload(download);
    },
  });
  return page;
}

describe("safeFilename", () => {
  it("keeps only the last path segment", () => {
    expect(safeFilename("../../reports/lote4.xlsx")).toBe("lote4.xlsx");
    expect(safeFilename("C:\\exports\\lote4.xlsx")).toBe("lote4.xlsx");
  });

  it("invents a name when none is usable", () => {
    expect(safeFilename("..")).toMatch(/^report-[0-9a-f-]{36}\.xlsx$/);
  });
});

describe("exportReport", () => {
  it("saves and validates the exported workbook", async () => {
    const download = new FakeDownload("lote4.xlsx", workbookBuffer());
    const session = await sessionOn(pageExporting(download));

    const artifact = await exportReport(session);

    const expectedPath = join(session.downloadDir, "lote4.xlsx");
    expect(artifact).toMatchObject({
      path: expectedPath,
      suggestedName: "lote4.xlsx",
      formatClass: "spreadsheet",
      validation: { valid: true, sheetCount: 1 },
    });
    expect(existsSync(expectedPath)).toBe(true);
    expect(download.deleted).toBe(false);
  });

  it("discards an export that fails validation", async () => {
    const download = new FakeDownload("lote4.xlsx", Buffer.from("<html>error</html>"));
    const session = await sessionOn(pageExporting(download));

    const artifact = await exportReport(session);

    expect(artifact).toBeNull();
    expect(existsSync(join(session.downloadDir, "lote4.xlsx"))).toBe(false);
    expect(download.deleted).toBe(true);
  });

  it("returns null when the export button is missing", async () => {
    const session = await sessionOn(new FakePage("results"));

    expect(await exportReport(session)).toBeNull();
  });

  it("returns null when no download starts", async () => {
    const session = await sessionOn(pageExporting());

    expect(await exportReport(session)).toBeNull();
  });

  it("stops waiting for the download when the export click fails", async () => {
    const page = new FakePage("results").element(PORTAL.SELECTORS.EXPORT_BUTTON, {
      onClick: () => {
        throw new Error("element detached");
      },
    });
    const session = await sessionOn(page);

    expect(await exportReport(session)).toBeNull();
    expect(page.cancelledDownloads).toBe(1);
  });
});
