/**
 * CapSolver API Client
 *
 * Fallback oracle for the portal's image captcha. Uses the CapSolver REST
 * API (createTask / getTaskResult pattern) with an ImageToTextTask.
 *
 * API docs: https://docs.capsolver.com
 */
import axios from "axios";
import { CaptchaOracle, CaptchaSolution } from "./captcha-solver";
import { CapSolverApiError } from "../../shared/errors/captcha.errors";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { sleep } from "../../shared/utils/retry";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("capsolver");

const API_URL = "https://api.capsolver.com";
const POLL_INTERVAL_MS = 3000;
const MAX_POLL_ATTEMPTS = 20; // 60 seconds max

interface CapSolverResponse {
  errorId: number;
  errorCode?: string;
  errorDescription?: string;
  taskId?: string;
  status?: string;
  solution?: { text?: string };
}

function isCapSolverResponse(data: unknown): data is CapSolverResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "errorId" in data &&
    typeof data.errorId === "number"
  );
}

export class CapSolverClient implements CaptchaOracle {
  readonly name = "capsolver";
  private apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async solve(image: Buffer): Promise<CaptchaSolution | null> {
    try {
      const response = await axios.post<unknown>(
        `${API_URL}/createTask`,
        {
          clientKey: this.apiKey,
          task: {
            type: "ImageToTextTask",
            body: image.toString("base64"),
            case: true,
          },
        },
        { timeout: 30000 }
      );
      const data = response.data;

      if (!isCapSolverResponse(data) || data.errorId !== 0) {
        this.logApiError(data, "image submit");
        return null;
      }

      // Image tasks are usually answered synchronously
      if (data.solution?.text) {
        return { code: data.solution.text, taskId: data.taskId, oracle: this.name };
      }
      if (!data.taskId) {
        this.logApiError(data, "image submit");
        return null;
      }

      const text = await this.pollResult(data.taskId);
      return text ? { code: text, taskId: data.taskId, oracle: this.name } : null;
    } catch (error) {
      throw new CapSolverApiError(errorMessage(error));
    }
  }

  private async pollResult(taskId: string): Promise<string | null> {
    for (let i = 0; i < MAX_POLL_ATTEMPTS; i++) {
      await sleep(POLL_INTERVAL_MS);

      const response = await axios.post<unknown>(
        `${API_URL}/getTaskResult`,
        { clientKey: this.apiKey, taskId },
        { timeout: 10000 }
      );
      const data = response.data;

      if (!isCapSolverResponse(data) || data.errorId !== 0) {
        this.logApiError(data, "poll");
        return null;
      }

      if (data.status === "ready") {
        return data.solution?.text ?? null;
      }

      // "processing": keep polling
    }

    log.warn({ taskId }, "CapSolver polling timed out");
    return null;
  }

  private logApiError(data: unknown, context: string): void {
    const errorCode = isCapSolverResponse(data) ? data.errorCode ?? "UNKNOWN" : "UNKNOWN";
    log.warn({ errorCode, response: data }, `CapSolver: ${context} failed`);
  }
}
