/**
 * Scoped Temporary Files
 *
 * Allocates a uniquely named file under the OS temp directory for the
 * duration of a callback and removes it afterwards, whether the callback
 * resolves or throws.
 */
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { errorMessage } from "../errors/scrape.errors";
import { logger } from "../../monitoring/logger";

const TEMP_DIR = path.join(os.tmpdir(), "portal-report-scraper");

export async function withTempFile<T>(
  extension: string,
  fn: (tempPath: string) => Promise<T>
): Promise<T> {
  await fs.promises.mkdir(TEMP_DIR, { recursive: true });
  const tempPath = path.join(TEMP_DIR, `${uuidv4()}${extension}`);

  try {
    return await fn(tempPath);
  } finally {
    await removeFile(tempPath);
  }
}

/** Delete a file if present. Failures are logged, never thrown. */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    logger.warn(
      { filePath, error: errorMessage(error) },
      "Failed to remove temporary file"
    );
  }
}
