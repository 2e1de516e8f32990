import { MAX_FILE_SIZE } from "@/lib/constants";
import { fileExtension, validateFileExtension } from "@/lib/validations/analysis";
import { IngestError, errorMessage } from "@/analysis/errors";
import type { IngestResult, LogRecord } from "@/analysis/types";
import { parseLogLines, splitLines } from "./log-parser";

/**
 * Decode raw upload bytes as UTF-8. A leading BOM is dropped; an invalid
 * byte sequence is an IngestError.
 */
export function decodeLogBytes(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new IngestError(`Input is not valid UTF-8 text: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Turn uploaded bytes into the ordered, frozen record sequence every
 * analysis stage reads from.
 */
export function ingestLog(bytes: Uint8Array, fileNameHint?: string): IngestResult {
  if (bytes.byteLength > MAX_FILE_SIZE) {
    throw new IngestError(
      `Input is ${bytes.byteLength} bytes; the limit is ${MAX_FILE_SIZE} bytes`,
    );
  }

  const text = decodeLogBytes(bytes);
  const lines = splitLines(text);
  if (lines.length === 0) {
    return { records: Object.freeze([]), format: "plain" };
  }

  // Unknown extensions (auth.log.1, syslog) carry no format hint
  const extension =
    fileNameHint && validateFileExtension(fileNameHint) ? fileExtension(fileNameHint) : "";
  const { texts, format } = parseLogLines(lines, extension);

  const records: LogRecord[] = texts.map((rawText, index) => Object.freeze({ index, rawText }));
  console.log(`[Ingest] Parsed ${records.length} ${format} records from ${lines.length} lines`);

  return { records: Object.freeze(records), format };
}
