import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import moment from "moment-timezone";
import { afterEach, describe, expect, it } from "vitest";
import { AppConfig, loadConfig } from "../src/config";
import { ReportSessionController, sessionLimitsFrom } from "../src/scraping/session/session-controller";
import { ReadinessDetector } from "../src/scraping/readiness/readiness-detector";
import { CaptchaRotationDetector } from "../src/scraping/login/success-detector";
import { PORTAL } from "../src/config/constants";
import { FakeDownload, ScriptedOracle } from "./support/fake-portal";
import { LoginScenario, loginScenario, scriptReportPages, workbookBuffer } from "./support/portal-scenario";

const REPORT = "CONSULTA_LOTE4_FECHADAS";
const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

async function testConfig(): Promise<AppConfig> {
  const downloadDir = await mkdtemp(join(tmpdir(), "session-controller-"));
  tempDirs.push(downloadDir);
  return loadConfig({
    PORTAL_LOGIN_URL: "https://portal.test/app/app.jsp",
    PORTAL_USERNAME: "test-user",
    PORTAL_PASSWORD: "test-secret",
    REPORT_NAME: REPORT,
    DOWNLOAD_DIR: downloadDir,
    MAX_CAPTCHA_RETRIES: "3",
    PAGE_TIMEOUT_MS: "300",
    ELEMENT_TIMEOUT_MS: "50",
    NEW_WINDOW_TIMEOUT_MS: "200",
    COMPLETION_TIMEOUT_MS: "5000",
    POLL_UNIT_MS: "1",
    EXPORT_TIMEOUT_MS: "500",
  });
}

function controllerFor(config: AppConfig, scenario: LoginScenario, oracle: ScriptedOracle): ReportSessionController {
  const readiness = new ReadinessDetector(10);
  return new ReportSessionController(config, {
    contextFactory: async () => scenario.context,
    oracle,
    readiness,
    successDetector: new CaptchaRotationDetector(readiness, {
      captchaRecheckTimeoutMs: 10,
      homeReadinessTimeoutMs: 300,
    }),
    timings: {
      loginSettleMs: 0,
      editorOpenMs: 0,
      saveSettleMs: 0,
      now: () => moment.tz("2024-03-15 10:00", "America/Sao_Paulo"),
    },
  });
}

describe("sessionLimitsFrom", () => {
  it("copies the configured limits", async () => {
    const limits = sessionLimitsFrom(await testConfig());

    expect(limits).toEqual({
      maxCaptchaRetries: 3,
      pageTimeoutMs: 300,
      elementTimeoutMs: 50,
      newWindowTimeoutMs: 200,
      completionTimeoutMs: 5000,
      pollUnitMs: 1,
      exportTimeoutMs: 500,
    });
  });
});

describe("ReportSessionController", () => {
  it("exports the report after a second login attempt and a late completion", async () => {
    const config = await testConfig();
    const scenario = loginScenario(1);
    const report = scriptReportPages(scenario.home, {
      reportName: REPORT,
      completeOnRead: 14,
      download: new FakeDownload("CONSULTA_LOTE4_FECHADAS.xlsx", workbookBuffer()),
    });
    const oracle = new ScriptedOracle(["aaaa", "bbbb"]);

    const outcome = await controllerFor(config, scenario, oracle).execute();

    const expectedPath = join(config.downloadDir, "CONSULTA_LOTE4_FECHADAS.xlsx");
    expect(outcome).toEqual({ success: true, artifactPath: expectedPath });
    expect(existsSync(expectedPath)).toBe(true);
    expect(scenario.submissions()).toBe(2);
    expect(report.progressReads()).toBe(14);
    expect(await scenario.home.locator(PORTAL.SELECTORS.CLOSING_DATE_FIELD).textContent()).toBe("14/03/24 00:00");
    expect(scenario.login.closed).toBe(true);
    expect(scenario.context.closed).toBe(true);
  });

  it("fails without touching the date when the report row is missing", async () => {
    const config = await testConfig();
    const scenario = loginScenario(0);
    scriptReportPages(scenario.home, { reportName: REPORT, listReport: false });

    const outcome = await controllerFor(config, scenario, new ScriptedOracle(["aaaa"])).execute();

    expect(outcome).toEqual({ success: false, artifactPath: null });
    expect(scenario.home.actions).toEqual([
      `click ${PORTAL.SELECTORS.MENU_QUERIES}`,
      `click ${PORTAL.SELECTORS.SUBMENU_QUERIES}`,
    ]);
    expect(scenario.context.closed).toBe(true);
  });

  it("fails when every login attempt is rejected", async () => {
    const config = await testConfig();
    const scenario = loginScenario(3);
    scriptReportPages(scenario.home, { reportName: REPORT });

    const outcome = await controllerFor(config, scenario, new ScriptedOracle(["a", "b", "c"])).execute();

    expect(outcome).toEqual({ success: false, artifactPath: null });
    expect(scenario.submissions()).toBe(3);
    expect(scenario.home.actions).toEqual([]);
  });

  it("keeps the outcome when closing the browser fails", async () => {
    const config = await testConfig();
    const scenario = loginScenario(0);
    scenario.context.closeError = new Error("browser already gone");
    scriptReportPages(scenario.home, { reportName: REPORT, listReport: false });

    const outcome = await controllerFor(config, scenario, new ScriptedOracle(["aaaa"])).execute();

    expect(outcome).toEqual({ success: false, artifactPath: null });
    expect(scenario.context.closed).toBe(true);
  });

  it("reports a context that cannot be created as a failed run", async () => {
    const config = await testConfig();
    const controller = new ReportSessionController(config, {
      contextFactory: async () => {
        throw new Error("Chrome not found");
      },
      oracle: new ScriptedOracle([]),
    });

    expect(await controller.execute()).toEqual({ success: false, artifactPath: null });
  });
});
