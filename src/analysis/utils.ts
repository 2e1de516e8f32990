/**
 * Truncate a line for display, preserving useful context.
 */
export function truncateLine(line: string, maxLength: number = 500): string {
  if (line.length <= maxLength) return line;
  return line.slice(0, maxLength) + "...";
}

/** Freeze an object graph of plain data (no cycles). */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}
