import { beforeEach, describe, expect, it, vi } from "vitest";

const { pollerLog } = vi.hoisted(() => ({
  pollerLog: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

vi.mock("../src/monitoring/logger", () => ({
  componentLogger: () => pollerLog,
}));

import {
  CompletionPoller,
  classifyProgressText,
  pollIntervalUnits,
} from "../src/scraping/polling/completion-poller";
import { PORTAL } from "../src/config/constants";
import { FakePage } from "./support/fake-portal";

const INDICATOR = PORTAL.SELECTORS.PROGRESS_INDICATOR;

describe("classifyProgressText", () => {
  it("reads the total after the marker", () => {
    expect(classifyProgressText("A visualizar 1 de 500")).toEqual({
      classification: "complete",
      rawText: "A visualizar 1 de 500",
      total: 500,
    });
  });

  it("reports no total when nothing follows the marker", () => {
    expect(classifyProgressText("A visualizar 1 de")).toEqual({
      classification: "no_total_found",
      rawText: "A visualizar 1 de",
      total: null,
    });
  });

  it("treats an empty or absent indicator as not found", () => {
    expect(classifyProgressText("").classification).toBe("indicator_not_found");
    expect(classifyProgressText("   ").classification).toBe("indicator_not_found");
    expect(classifyProgressText(null).classification).toBe("indicator_not_found");
  });

  it("rejects text without the marker or without digits", () => {
    expect(classifyProgressText("A visualizar 1 of 500").classification).toBe("invalid_format");
    expect(classifyProgressText("A visualizar de").classification).toBe("invalid_format");
  });

  it("keeps a zero total apart from completion", () => {
    expect(classifyProgressText("A visualizar 0 de 0")).toEqual({
      classification: "zero_total",
      rawText: "A visualizar 0 de 0",
      total: 0,
    });
  });

  it("takes the first number after the marker", () => {
    expect(classifyProgressText("  A visualizar 1 - 50 de 1200 ").total).toBe(1200);
  });
});

describe("pollIntervalUnits", () => {
  it("widens the interval after the tenth tick", () => {
    expect(pollIntervalUnits(1)).toBe(1);
    expect(pollIntervalUnits(10)).toBe(1);
    expect(pollIntervalUnits(11)).toBe(2);
    expect(pollIntervalUnits(40)).toBe(2);
  });
});

describe("CompletionPoller", () => {
  const poller = new CompletionPoller();

  beforeEach(() => {
    pollerLog.warn.mockClear();
    pollerLog.debug.mockClear();
  });

  it("completes on the tick the total appears", async () => {
    let reads = 0;
    const page = new FakePage("results").element(INDICATOR, {
      text: () => {
        reads += 1;
        return reads >= 14 ? "A visualizar 1 de 1200" : "A visualizar 0 de 0";
      },
    });

    const result = await poller.waitForCompletion(page, { timeoutMs: 5000, pollUnitMs: 1 });

    expect(result.completed).toBe(true);
    expect(result.ticks).toBe(14);
    expect(result.status.total).toBe(1200);
  });

  it("keeps polling while the indicator is missing", async () => {
    let visibleAfter = 3;
    const page = new FakePage("results").element(INDICATOR, {
      visible: () => {
        visibleAfter -= 1;
        return visibleAfter < 0;
      },
      text: "A visualizar 1 de 7",
    });

    const result = await poller.waitForCompletion(page, { timeoutMs: 5000, pollUnitMs: 1 });

    expect(result.completed).toBe(true);
    expect(result.ticks).toBe(4);
  });

  it("times out without a positive total", async () => {
    const page = new FakePage("results").element(INDICATOR, { text: "A visualizar 0 de 0" });

    const result = await poller.waitForCompletion(page, { timeoutMs: 40, pollUnitMs: 5 });

    expect(result.completed).toBe(false);
    expect(result.status.classification).toBe("zero_total");
    expect(result.elapsedMs).toBeGreaterThanOrEqual(40);
  });

  it("classifies a failing read as an error and carries on", async () => {
    let reads = 0;
    const page = new FakePage("results").element(INDICATOR, {
      text: () => {
        reads += 1;
        if (reads === 1) throw new Error("element detached");
        return "A visualizar 1 de 3";
      },
    });

    const result = await poller.waitForCompletion(page, { timeoutMs: 5000, pollUnitMs: 1 });

    expect(result.completed).toBe(true);
    expect(result.ticks).toBe(2);
  });

  it("logs a run of failing reads once", async () => {
    let reads = 0;
    const page = new FakePage("results").element(INDICATOR, {
      text: () => {
        reads += 1;
        if (reads <= 3) throw new Error("element detached");
        return "A visualizar 1 de 3";
      },
    });

    const result = await poller.waitForCompletion(page, { timeoutMs: 5000, pollUnitMs: 1 });

    expect(result.ticks).toBe(4);
    expect(pollerLog.warn).toHaveBeenCalledTimes(1);
    expect(pollerLog.warn).toHaveBeenCalledWith({ tick: 1, error: "element detached" }, "Progress check failed");
  });
});
