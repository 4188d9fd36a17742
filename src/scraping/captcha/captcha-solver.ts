/**
 * CAPTCHA Solver: oracle chain facade
 *
 * The portal's login form shows a plain image captcha. Solving is
 * delegated to external oracles (2Captcha first, CapSolver as fallback);
 * this facade asks each configured oracle in turn and returns the first
 * solution.
 *
 * Oracles are HTTP clients, so a solve never blocks the event loop even
 * though it can take tens of seconds.
 */
import { OracleError } from "../../shared/errors/captcha.errors";
import { errorMessage } from "../../shared/errors/scrape.errors";
import { componentLogger } from "../../monitoring/logger";

const log = componentLogger("captcha");

export interface CaptchaSolution {
  code: string;
  /** Oracle-side identifier of the solved task */
  taskId?: string;
  oracle: string;
}

/**
 * Interface that every captcha oracle client implements.
 */
export interface CaptchaOracle {
  /** Human-readable name for logging */
  readonly name: string;
  /** Whether credentials for this oracle are present */
  isConfigured(): boolean;
  /** Solve a PNG image; null when the oracle gave no answer */
  solve(image: Buffer): Promise<CaptchaSolution | null>;
}

export class CaptchaSolver implements CaptchaOracle {
  readonly name = "chain";
  private oracles: CaptchaOracle[];

  constructor(oracles: CaptchaOracle[]) {
    this.oracles = oracles;
  }

  isConfigured(): boolean {
    return this.oracles.some((oracle) => oracle.isConfigured());
  }

  /**
   * Try each configured oracle in order until one returns a code.
   * @throws OracleError if no oracle produced a solution
   */
  async solve(image: Buffer): Promise<CaptchaSolution> {
    if (image.length === 0) {
      throw new OracleError("Captcha image is empty");
    }

    for (const oracle of this.oracles) {
      if (!oracle.isConfigured()) continue;

      try {
        log.info({ oracle: oracle.name, imageBytes: image.length }, "Submitting captcha");
        const solution = await oracle.solve(image);

        if (solution && solution.code.trim().length > 0) {
          log.info(
            { oracle: oracle.name, codeLength: solution.code.length },
            "Captcha solved"
          );
          return { ...solution, code: solution.code.trim() };
        }

        log.warn({ oracle: oracle.name }, "Captcha oracle returned no solution");
      } catch (error) {
        log.warn(
          { oracle: oracle.name, error: errorMessage(error) },
          "Captcha oracle threw error"
        );
      }
    }

    throw new OracleError("All captcha oracles exhausted");
  }
}
