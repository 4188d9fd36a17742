/**
 * 2Captcha API Client
 *
 * Solves the portal's image captcha through the 2Captcha service.
 *
 * API docs: https://2captcha.com/2captcha-api
 *
 * Flow:
 * 1. POST to in.php with method=base64 and the PNG body
 * 2. Receive task ID ({ status: 1, request: taskId })
 * 3. Poll res.php until the solution is ready
 * 4. Receive the code ({ status: 1, request: code })
 */
import axios from "axios";
import { CaptchaOracle, CaptchaSolution } from "./captcha-solver";
import { TwoCaptchaApiError } from "../../shared/errors/captcha.errors";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { sleep } from "../../shared/utils/retry";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("2captcha");

const API_BASE = "https://2captcha.com";

export interface TwoCaptchaTiming {
  /** Wait before the first poll; image captchas are usually ready in ~5s */
  initialDelayMs: number;
  pollIntervalMs: number;
  maxPollAttempts: number;
}

const DEFAULT_TIMING: TwoCaptchaTiming = {
  initialDelayMs: 5000,
  pollIntervalMs: 5000,
  maxPollAttempts: 24, // 2 minutes
};

interface TwoCaptchaResponse {
  status: number;
  request: string;
  error_text?: string;
}

function isTwoCaptchaResponse(data: unknown): data is TwoCaptchaResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "status" in data &&
    "request" in data &&
    typeof data.status === "number" &&
    typeof data.request === "string"
  );
}

const ERROR_MESSAGES: Record<string, string> = {
  ERROR_WRONG_USER_KEY: "invalid API key",
  ERROR_KEY_DOES_NOT_EXIST: "API key does not exist",
  ERROR_ZERO_BALANCE: "zero balance — add funds",
  ERROR_NO_SLOT_AVAILABLE: "no workers available, try again later",
  ERROR_ZERO_CAPTCHA_FILESIZE: "captcha image is empty",
  ERROR_TOO_BIG_CAPTCHA_FILESIZE: "captcha image is too big",
  ERROR_IMAGE_TYPE_NOT_SUPPORTED: "captcha image type not supported",
  ERROR_CAPTCHA_UNSOLVABLE: "captcha could not be solved",
  IP_BANNED: "IP address is banned",
};

export class TwoCaptchaClient implements CaptchaOracle {
  readonly name = "2captcha";
  private apiKey: string;
  private timing: TwoCaptchaTiming;

  constructor(apiKey: string, timing: Partial<TwoCaptchaTiming> = {}) {
    this.apiKey = apiKey;
    this.timing = { ...DEFAULT_TIMING, ...timing };
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Solve an image captcha.
   * Returns null when 2Captcha answered with an error code or polling ran
   * out; throws TwoCaptchaApiError when the service could not be reached.
   */
  async solve(image: Buffer): Promise<CaptchaSolution | null> {
    if (!this.isConfigured()) {
      log.warn("2Captcha: API key not configured");
      return null;
    }

    let taskId: string;
    try {
      const form = new URLSearchParams({
        key: this.apiKey,
        method: "base64",
        body: image.toString("base64"),
        json: "1",
      });
      const submitResponse = await axios.post<unknown>(`${API_BASE}/in.php`, form, {
        timeout: 30000,
      });
      const submitData = submitResponse.data;

      if (!isTwoCaptchaResponse(submitData) || submitData.status !== 1) {
        this.logApiError(submitData, "image submit");
        return null;
      }
      taskId = submitData.request;
    } catch (error) {
      const msg = errorMessage(error);
      log.error({ error: msg }, "2Captcha: image submit failed");
      throw new TwoCaptchaApiError(msg);
    }

    log.debug({ taskId }, "2Captcha: image submitted, polling for solution");
    const code = await this.pollResult(taskId);
    return code ? { code, taskId, oracle: this.name } : null;
  }

  /**
   * Poll 2Captcha for the solution of a submitted task.
   */
  private async pollResult(taskId: string): Promise<string | null> {
    await sleep(this.timing.initialDelayMs);

    for (let i = 0; i < this.timing.maxPollAttempts; i++) {
      try {
        const response = await axios.get<unknown>(`${API_BASE}/res.php`, {
          params: {
            key: this.apiKey,
            action: "get",
            id: taskId,
            json: 1,
          },
          timeout: 10000,
        });
        const data = response.data;

        if (isTwoCaptchaResponse(data)) {
          if (data.status === 1) return data.request;
          if (data.request !== "CAPCHA_NOT_READY") {
            this.logApiError(data, "poll");
            return null;
          }
        } else {
          this.logApiError(data, "poll");
          return null;
        }
      } catch (error) {
        log.warn({ taskId, error: errorMessage(error) }, "2Captcha: poll request failed, retrying");
      }

      await sleep(this.timing.pollIntervalMs);
    }

    log.warn({ taskId, polls: this.timing.maxPollAttempts }, "2Captcha: polling timed out");
    return null;
  }

  private logApiError(data: unknown, context: string): void {
    const errorCode = isTwoCaptchaResponse(data) ? data.request : "UNKNOWN";
    const message = ERROR_MESSAGES[errorCode] || `unknown error: ${errorCode}`;
    log.warn({ errorCode, response: data }, `2Captcha: ${context} — ${message}`);
  }
}
