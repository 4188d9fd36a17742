/**
 * Readiness Detector
 *
 * Decides whether a portal page has finished loading. All conditions of
 * a ReadinessSpec (network idle, document ready, element visibility) are
 * awaited together; the check passes only when every one of them
 * resolves before the ReadinessSpec's timeout. A failing condition never aborts
 * its siblings.
 *
 * When the timeout fires first, its critical selectors get one
 * short probe: any of them already present counts as ready. The portal
 * keeps long-polling connections open, so the idle-network signal
 * routinely lags behind the element that matters.
 */
import { UiPage } from "../../shared/types/driver.types";
import { ReadinessCondition, ReadinessSpec } from "../../shared/types/session.types";
import { WAITS } from "../../config/constants";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { TIMED_OUT, withDeadline } from "../../shared/utils/deadline";
import { secondsSince } from "../../shared/utils/date";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("readiness");

export interface ReadinessOptions {
  timeoutMs?: number;
  /** Elements that must be visible; also the rescue candidates on timeout */
  checkElements?: string[];
}

/**
 * Build the standard spec: idle network, complete document, and one
 * visibility condition per element.
 */
export function readinessSpec(stepName: string, options: ReadinessOptions = {}): ReadinessSpec {
  const checkElements = options.checkElements ?? [];
  const conditions: ReadinessCondition[] = [
    { kind: "network-idle" },
    { kind: "document-ready" },
    ...checkElements.map((selector): ReadinessCondition => ({ kind: "element-visible", selector })),
  ];

  return Object.freeze({
    stepName,
    timeoutMs: options.timeoutMs ?? WAITS.READINESS_TIMEOUT_MS,
    conditions: Object.freeze(conditions),
    criticalSelectors: Object.freeze([...checkElements]),
  });
}

function describe(condition: ReadinessCondition): string {
  return condition.kind === "element-visible" ? `visible ${condition.selector}` : condition.kind;
}

export class ReadinessDetector {
  constructor(private readonly rescueProbeMs: number = WAITS.RESCUE_PROBE_TIMEOUT_MS) {}

  async wait(page: UiPage, spec: ReadinessSpec): Promise<boolean> {
    log.info({ step: spec.stepName }, "Waiting for page");
    const startTime = Date.now();

    const pending = Promise.allSettled(
      spec.conditions.map((condition) => this.evaluate(page, condition, spec.timeoutMs))
    );
    const outcome = await withDeadline(pending, spec.timeoutMs);

    if (outcome === TIMED_OUT) {
      log.error({ step: spec.stepName, timeoutMs: spec.timeoutMs }, "Timed out waiting for page");
      return this.rescue(page, spec);
    }

    const failed = outcome
      .map((result, i) => ({ result, condition: spec.conditions[i] }))
      .filter(({ result }) => result.status === "rejected");

    if (failed.length > 0) {
      log.error(
        {
          step: spec.stepName,
          failed: failed.map(({ result, condition }) => ({
            condition: describe(condition),
            error: result.status === "rejected" ? errorMessage(result.reason) : undefined,
          })),
        },
        "Some page conditions failed"
      );
      return false;
    }

    log.info({ step: spec.stepName, seconds: secondsSince(startTime) }, "Page ready");
    return true;
  }

  private async evaluate(page: UiPage, condition: ReadinessCondition, timeoutMs: number): Promise<void> {
    switch (condition.kind) {
      case "network-idle":
        return page.waitForNetworkIdle(timeoutMs);
      case "document-ready":
        return page.waitForDocumentReady(timeoutMs);
      case "element-visible":
        return page.locator(condition.selector).waitForVisible(timeoutMs);
    }
  }

  /**
   * One short presence probe per critical selector after a timeout.
   */
  private async rescue(page: UiPage, spec: ReadinessSpec): Promise<boolean> {
    for (const selector of spec.criticalSelectors) {
      try {
        const count = await withDeadline(page.locator(selector).count(), this.rescueProbeMs);
        if (count !== TIMED_OUT && count > 0) {
          log.info({ step: spec.stepName, selector }, "Critical element present despite timeout");
          return true;
        }
      } catch (error) {
        log.debug({ step: spec.stepName, selector, error: errorMessage(error) }, "Rescue probe failed");
      }
    }
    return false;
  }
}
