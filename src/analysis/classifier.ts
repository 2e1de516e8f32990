import { ERROR_PATTERN, WARNING_PATTERN } from "@/lib/constants";
import type { ClassificationResult, LogRecord, RecordLabel } from "./types";

export interface ClassifyOptions {
  /**
   * Count a record matching both patterns as an error only.
   * Off by default: such a record increments both counters.
   */
  exclusive?: boolean;
}

function isErrorText(text: string): boolean {
  return text.toLowerCase().includes(ERROR_PATTERN);
}

function isWarningText(text: string): boolean {
  return text.toLowerCase().includes(WARNING_PATTERN);
}

/** Label a single record; errors take precedence over warnings. */
export function labelRecord(record: LogRecord): RecordLabel {
  if (isErrorText(record.rawText)) return "ERROR";
  if (isWarningText(record.rawText)) return "WARNING";
  return "NORMAL";
}

/**
 * Count error, warning and normal records.
 *
 * In non-exclusive mode errorCount + warningCount may exceed total.
 * normalCount is always the number of records matching neither pattern.
 */
export function classifyRecords(
  records: readonly LogRecord[],
  options: ClassifyOptions = {},
): ClassificationResult {
  const exclusive = options.exclusive ?? false;
  let errorCount = 0;
  let warningCount = 0;
  let normalCount = 0;

  for (const record of records) {
    const error = isErrorText(record.rawText);
    const warning = isWarningText(record.rawText);

    if (error) errorCount++;
    if (warning && !(exclusive && error)) warningCount++;
    if (!error && !warning) normalCount++;
  }

  return {
    total: records.length,
    errorCount,
    warningCount,
    normalCount,
    mode: exclusive ? "exclusive" : "non-exclusive",
  };
}
