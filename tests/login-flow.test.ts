import { existsSync } from "node:fs";
import { describe, expect, it, vi } from "vitest";
import { LoginFlow } from "../src/scraping/login/login-flow";
import { CaptchaRotationDetector } from "../src/scraping/login/success-detector";
import { ReadinessDetector } from "../src/scraping/readiness/readiness-detector";
import { PortalSession } from "../src/scraping/session/portal-session";
import { SessionLimits } from "../src/shared/types/session.types";
import { PORTAL } from "../src/config/constants";
import { ScriptedOracle } from "./support/fake-portal";
import { LoginScenario, loginScenario } from "./support/portal-scenario";

const LOGIN_URL = "https://portal.test/app/app.jsp";

function limits(maxCaptchaRetries: number, newWindowTimeoutMs: number): SessionLimits {
  return {
    maxCaptchaRetries,
    pageTimeoutMs: 500,
    elementTimeoutMs: 100,
    newWindowTimeoutMs,
    completionTimeoutMs: 500,
    pollUnitMs: 1,
    exportTimeoutMs: 500,
  };
}

async function setup(
  scenario: LoginScenario,
  oracle: ScriptedOracle,
  maxAttempts: number,
  newWindowTimeoutMs = 200
) {
  const session = await PortalSession.open(
    scenario.context,
    { username: "test-user", password: "test-secret" },
    limits(maxAttempts, newWindowTimeoutMs),
    "/tmp/downloads"
  );
  const readiness = new ReadinessDetector(10);
  const flow = new LoginFlow({
    loginUrl: LOGIN_URL,
    oracle,
    readiness,
    successDetector: new CaptchaRotationDetector(readiness, {
      captchaRecheckTimeoutMs: 10,
      homeReadinessTimeoutMs: 500,
    }),
    settleMs: 0,
  });
  return { session, flow };
}

describe("LoginFlow", () => {
  it("succeeds on the attempt after two rejected captchas", async () => {
    const scenario = loginScenario(2);
    const oracle = new ScriptedOracle(["aaaa", "bbbb", "cccc"]);
    const { session, flow } = await setup(scenario, oracle, 5);

    const loggedIn = await flow.run(session);

    expect(loggedIn).toBe(true);
    expect(flow.currentState).toBe("Success");
    expect(session.loginAttemptCount).toBe(3);
    expect(scenario.submissions()).toBe(3);
    expect(session.currentPage).toBe(scenario.home);
    expect(scenario.login.closed).toBe(true);
    expect(scenario.login.visited).toEqual([LOGIN_URL]);
  });

  it("stops at the maximum without a further attempt", async () => {
    const scenario = loginScenario(3);
    const oracle = new ScriptedOracle(["aaaa", "bbbb", "cccc", "dddd"]);
    const { session, flow } = await setup(scenario, oracle, 3);

    const loggedIn = await flow.run(session);

    expect(loggedIn).toBe(false);
    expect(flow.currentState).toBe("RetryOrFail");
    expect(session.loginAttemptCount).toBe(3);
    expect(scenario.submissions()).toBe(3);
    expect(oracle.images).toHaveLength(3);
    expect(session.currentPage).toBe(scenario.login);
  });

  it("fails a rotated-captcha attempt without waiting for a new window", async () => {
    const scenario = loginScenario(1);
    const { session, flow } = await setup(scenario, new ScriptedOracle(["aaaa"]), 1, 5000);
    const waitForNewWindow = vi.spyOn(session, "waitForNewWindow");
    const startedAt = Date.now();

    const loggedIn = await flow.run(session);

    expect(loggedIn).toBe(false);
    expect(waitForNewWindow).not.toHaveBeenCalled();
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it("fills identity, secret and captcha in that order before submitting", async () => {
    const scenario = loginScenario(0);
    const { session, flow } = await setup(scenario, new ScriptedOracle(["x7k2"]), 5);

    await flow.run(session);

    expect(scenario.login.actions).toEqual([
      `fill ${PORTAL.SELECTORS.USERNAME_INPUT} test-user`,
      `fill ${PORTAL.SELECTORS.PASSWORD_INPUT} test-secret`,
      `fill ${PORTAL.SELECTORS.CAPTCHA_INPUT} x7k2`,
      "press Enter",
    ]);
  });

  it("captures a fresh captcha per attempt and removes every image file", async () => {
    const scenario = loginScenario(1);
    const { session, flow } = await setup(scenario, new ScriptedOracle(["aaaa", "bbbb"]), 5);

    await flow.run(session);

    expect(scenario.login.screenshotPaths).toHaveLength(2);
    expect(new Set(scenario.login.screenshotPaths).size).toBe(2);
    for (const imagePath of scenario.login.screenshotPaths) {
      expect(existsSync(imagePath)).toBe(false);
    }
  });

  it("moves to the next attempt without submitting when the oracle has no answer", async () => {
    const scenario = loginScenario(0);
    const { session, flow } = await setup(scenario, new ScriptedOracle([null, "bbbb"]), 5);

    const loggedIn = await flow.run(session);

    expect(loggedIn).toBe(true);
    expect(session.loginAttemptCount).toBe(2);
    expect(scenario.submissions()).toBe(1);
  });

  it("fails every attempt when a login field is missing", async () => {
    const scenario = loginScenario(0);
    scenario.login.elements.delete(PORTAL.SELECTORS.CAPTCHA_INPUT);
    const oracle = new ScriptedOracle(["aaaa"]);
    const { session, flow } = await setup(scenario, oracle, 2);

    const loggedIn = await flow.run(session);

    expect(loggedIn).toBe(false);
    expect(session.loginAttemptCount).toBe(2);
    expect(oracle.images).toHaveLength(0);
  });
});
