import moment from "moment-timezone";
import { describe, expect, it } from "vitest";
import { openReportEditor } from "../src/scraping/navigators/report-navigator";
import { adjustDateAndExecute } from "../src/scraping/navigators/query-executor";
import { ReadinessDetector } from "../src/scraping/readiness/readiness-detector";
import { PortalSession } from "../src/scraping/session/portal-session";
import { PORTAL } from "../src/config/constants";
import { FakeContext, FakePage } from "./support/fake-portal";
import { scriptReportPages } from "./support/portal-scenario";

const S = PORTAL.SELECTORS;
const REPORT = "CONSULTA_LOTE4_FECHADAS";
const TIMEZONE = "America/Sao_Paulo";
const readiness = new ReadinessDetector(10);

async function sessionOn(page: FakePage): Promise<PortalSession> {
  return PortalSession.open(
    new FakeContext(page),
    { username: "test-user", password: "test-secret" },
    {
      maxCaptchaRetries: 1,
      pageTimeoutMs: 200,
      elementTimeoutMs: 50,
      newWindowTimeoutMs: 50,
      completionTimeoutMs: 200,
      pollUnitMs: 1,
      exportTimeoutMs: 200,
    },
    "/tmp/downloads"
  );
}

const executeOptions = {
  timezone: TIMEZONE,
  now: moment.tz("2024-03-15 10:00", TIMEZONE),
  editorOpenMs: 0,
  saveSettleMs: 0,
};

describe("openReportEditor", () => {
  it("walks menu, item and report row to the editor", async () => {
    const home = new FakePage("home");
    scriptReportPages(home, { reportName: REPORT });

    const opened = await openReportEditor(await sessionOn(home), readiness, REPORT);

    expect(opened).toBe(true);
    expect(home.actions).toEqual([
      `click ${S.MENU_QUERIES}`,
      `click ${S.SUBMENU_QUERIES}`,
      `dblclick ${PORTAL.reportRow(REPORT)}`,
    ]);
  });

  it("stops when the report is not listed", async () => {
    const home = new FakePage("home");
    scriptReportPages(home, { reportName: REPORT, listReport: false });

    const opened = await openReportEditor(await sessionOn(home), readiness, REPORT);

    expect(opened).toBe(false);
    expect(home.actions).toEqual([`click ${S.MENU_QUERIES}`, `click ${S.SUBMENU_QUERIES}`]);
  });

  it("stops at the first step when the menu is missing", async () => {
    const home = new FakePage("home");

    expect(await openReportEditor(await sessionOn(home), readiness, REPORT)).toBe(false);
    expect(home.actions).toEqual([]);
  });
});

describe("adjustDateAndExecute", () => {
  it("sets yesterday's date, saves and executes", async () => {
    const home = new FakePage("home");
    scriptReportPages(home, { reportName: REPORT });
    const session = await sessionOn(home);
    await openReportEditor(session, readiness, REPORT);

    const executed = await adjustDateAndExecute(session, readiness, executeOptions);

    expect(executed).toBe(true);
    expect(await home.locator(S.CLOSING_DATE_FIELD).textContent()).toBe("14/03/24 00:00");
    expect(home.actions.slice(3)).toEqual([
      `click ${S.CLOSING_DATE_FIELD}`,
      `click ${S.FOCUSED_INPUT}`,
      `fill ${S.FOCUSED_INPUT} `,
      `fill ${S.FOCUSED_INPUT} 14/03/24 00:00`,
      "press Enter",
      `click ${S.SAVE_BUTTON}`,
      `click ${S.EXECUTE_BUTTON}`,
    ]);
  });

  it("does not save when the date did not change", async () => {
    const home = new FakePage("home")
      .element(S.CLOSING_DATE_FIELD, { text: "01/01/24 00:00" })
      .element(S.FOCUSED_INPUT)
      .element(S.SAVE_BUTTON)
      .element(S.EXECUTE_BUTTON);

    const executed = await adjustDateAndExecute(await sessionOn(home), readiness, executeOptions);

    expect(executed).toBe(false);
    expect(home.actions).not.toContain(`click ${S.SAVE_BUTTON}`);
  });

  it("accepts a date that already reads yesterday", async () => {
    const home = new FakePage("home")
      .element(S.CLOSING_DATE_FIELD, { text: "14/03/24 00:00" })
      .element(S.FOCUSED_INPUT)
      .element(S.SAVE_BUTTON)
      .element(S.EXECUTE_BUTTON)
      .element(S.EXPORT_BUTTON);

    const executed = await adjustDateAndExecute(await sessionOn(home), readiness, executeOptions);

    expect(executed).toBe(true);
    expect(home.actions).toContain(`click ${S.EXECUTE_BUTTON}`);
  });

  it("fails when the inline editor never takes focus", async () => {
    const home = new FakePage("home").element(S.CLOSING_DATE_FIELD, { text: "01/01/24 00:00" });

    expect(await adjustDateAndExecute(await sessionOn(home), readiness, executeOptions)).toBe(false);
  });
});
