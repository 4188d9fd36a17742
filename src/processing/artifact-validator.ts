/**
 * Artifact Validator
 *
 * Checks an exported report before it is handed to the caller:
 * - zero-byte files are rejected whatever their type
 * - spreadsheets must carry their format's signature and open with at
 *   least one sheet (sheet names only, no cell parsing)
 * - legacy .xls files must also be compound documents holding a
 *   workbook stream, since SheetJS reads anything else as plain text
 * - anything else is accepted on size alone
 */
import * as fs from "fs";
import * as path from "path";
import * as CFB from "cfb";
import * as XLSX from "xlsx";
import { ArtifactValidation, FormatClass } from "../shared/types/session.types";
import { ValidationError, errorMessage } from "../shared/errors/scrape.errors";
import { ARTIFACT } from "../config/constants";
import { componentLogger } from "../monitoring/logger";

const log = componentLogger("validator");

export function formatClassOf(filePath: string): FormatClass {
  const extension = path.extname(filePath).toLowerCase();
  return ARTIFACT.SPREADSHEET_EXTENSIONS.some((known) => known === extension) ? "spreadsheet" : "other";
}

async function readHeader(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function isLegacyWorkbook(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".xls";
}

function expectedSignature(filePath: string): readonly number[] {
  return isLegacyWorkbook(filePath) ? ARTIFACT.XLS_SIGNATURE : ARTIFACT.XLSX_SIGNATURE;
}

/** @throws ValidationError unless the container holds a BIFF workbook stream */
async function assertWorkbookStream(filePath: string): Promise<void> {
  let container: CFB.CFB$Container;
  try {
    container = CFB.read(await fs.promises.readFile(filePath), { type: "buffer" });
  } catch (error) {
    throw new ValidationError(`Workbook could not be opened: ${errorMessage(error)}`);
  }

  if (!ARTIFACT.XLS_WORKBOOK_STREAMS.some((name) => CFB.find(container, name) !== null)) {
    throw new ValidationError("Workbook could not be opened: no workbook stream");
  }
}

/**
 * Open the workbook and count its sheets.
 * @throws ValidationError when the file is not a readable workbook
 */
async function countSheets(filePath: string): Promise<number> {
  const signature = expectedSignature(filePath);
  const header = await readHeader(filePath, signature.length);
  if (header.length < signature.length || signature.some((byte, i) => header[i] !== byte)) {
    throw new ValidationError("File signature does not match a spreadsheet");
  }

  if (isLegacyWorkbook(filePath)) {
    await assertWorkbookStream(filePath);
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.readFile(filePath, { bookSheets: true });
  } catch (error) {
    throw new ValidationError(`Workbook could not be opened: ${errorMessage(error)}`);
  }

  const sheetCount = workbook.SheetNames.length;
  if (sheetCount < 1) {
    throw new ValidationError("Workbook has no sheets");
  }
  return sheetCount;
}

export interface ValidatedArtifact {
  size: number;
  formatClass: FormatClass;
  validation: ArtifactValidation;
}

/**
 * Validate the file at `filePath`. Never throws: an unreadable file is
 * reported as invalid.
 */
export async function validateArtifact(filePath: string): Promise<ValidatedArtifact> {
  const formatClass = formatClassOf(filePath);
  let size = 0;

  try {
    size = (await fs.promises.stat(filePath)).size;
    if (size === 0) {
      throw new ValidationError("File is empty");
    }

    if (formatClass === "other") {
      log.info({ filePath, size }, "Artifact accepted on size");
      return { size, formatClass, validation: { valid: true } };
    }

    const sheetCount = await countSheets(filePath);
    log.info({ filePath, size, sheetCount }, "Spreadsheet validated");
    return { size, formatClass, validation: { valid: true, sheetCount } };
  } catch (error) {
    const reason = errorMessage(error);
    log.warn({ filePath, size, reason }, "Artifact rejected");
    return { size, formatClass, validation: { valid: false, reason } };
  }
}
