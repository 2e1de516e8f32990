/**
 * Log format detection and record flattening.
 *
 * A file is treated as CSV or JSONL only when every line fits that shape;
 * anything else is plain text, one record per line.
 */

import type { LogFormat } from "@/analysis/types";

export interface ParseResult {
  /** Flattened text of each record, in file order */
  texts: string[];
  format: LogFormat;
}

/** Header cells must look like column names, not free text */
const CSV_HEADER_CELL = /^[A-Za-z_][\w .-]*$/;

/**
 * Split decoded text into lines. A single trailing line break does not
 * start an extra (empty) line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Parse a CSV line, honouring double-quoted fields and "" escapes.
 * Returns null when a quote is left open.
 */
export function parseCsvValues(line: string): string[] | null {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && i + 1 < line.length && line[i + 1] === '"') {
        current += '"';
        i++; // skip escaped quote
      } else {
        inQuotes = !inQuotes;
      }
    } else if (ch === "," && !inQuotes) {
      values.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  if (inQuotes) return null;
  values.push(current);
  return values;
}

/**
 * Parse a CSV header line and return column names, or null when the line
 * does not look like a header.
 */
export function parseCsvHeader(headerLine: string): string[] | null {
  const cells = parseCsvValues(headerLine);
  if (!cells || cells.length < 2) return null;

  const headers = cells.map((col) => col.trim());
  if (!headers.every((h) => CSV_HEADER_CELL.test(h))) return null;
  if (new Set(headers).size !== headers.length) return null;
  return headers;
}

/**
 * Flatten every data row of a CSV file. Returns null as soon as the file
 * stops looking like a table (bad header, open quote, ragged row) or has
 * no data rows.
 */
export function parseCsv(lines: string[]): string[] | null {
  const headerAt = lines.findIndex((line) => line.trim().length > 0);
  if (headerAt === -1) return null;

  const headers = parseCsvHeader(lines[headerAt]);
  if (!headers) return null;

  const texts: string[] = [];
  for (const line of lines.slice(headerAt + 1)) {
    if (!line.trim()) continue;
    const values = parseCsvValues(line);
    if (!values || values.length !== headers.length) return null;
    texts.push(
      values
        .map((v) => v.trim())
        .filter((v) => v.length > 0)
        .join(" "),
    );
  }
  return texts.length > 0 ? texts : null;
}

function collectLeafValues(value: unknown, parts: string[]): void {
  if (value === null || value === undefined) return;
  if (Array.isArray(value)) {
    for (const item of value) collectLeafValues(item, parts);
    return;
  }
  if (typeof value === "object") {
    for (const nested of Object.values(value)) collectLeafValues(nested, parts);
    return;
  }
  parts.push(String(value));
}

/**
 * Flatten a JSON object line into its values joined by spaces.
 * Nested objects are walked in key order. Returns null for anything that
 * is not a JSON object.
 */
export function flattenJsonLine(line: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;

  const parts: string[] = [];
  collectLeafValues(parsed, parts);
  return parts.join(" ");
}

/**
 * Flatten every non-blank line of a JSONL file, or null if any of them is
 * not a JSON object.
 */
export function parseJsonl(lines: string[]): string[] | null {
  const texts: string[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    if (!trimmed.startsWith("{")) return null;
    const text = flattenJsonLine(trimmed);
    if (text === null) return null;
    texts.push(text);
  }
  return texts.length > 0 ? texts : null;
}

/**
 * Structured formats to try for a given file extension hint, in order.
 */
export function candidateFormats(extension: string): Exclude<LogFormat, "plain">[] {
  if (extension === ".csv") return ["csv"];
  if (extension === ".jsonl") return ["jsonl"];
  return ["csv", "jsonl"];
}

/**
 * Parse all lines of a log file into flattened record texts.
 * Structured formats are tried first; plain lines are the fallback.
 */
export function parseLogLines(lines: string[], extension: string = ""): ParseResult {
  for (const format of candidateFormats(extension)) {
    const texts = format === "csv" ? parseCsv(lines) : parseJsonl(lines);
    if (texts) return { texts, format };
  }
  return { texts: lines, format: "plain" };
}
