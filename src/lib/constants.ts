export const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
export const ALLOWED_EXTENSIONS = [".txt", ".log", ".csv", ".jsonl"];

/** Number of records kept on the report for a quick look at the input */
export const PREVIEW_SIZE = 20;
export const PREVIEW_LINE_LENGTH = 500;

export const DEFAULT_CONTAMINATION = 0.1;
export const DEFAULT_SEED = 42;
export const MAX_CONTAMINATION = 0.5;

export const DEFAULT_SUMMARY_MAX_RECORDS = 50;
export const DEFAULT_SUMMARY_MIN_LENGTH = 30;
export const DEFAULT_SUMMARY_MAX_LENGTH = 120;

export const DEFAULT_ANALYSIS_TIMEOUT_MS = 60_000;

export const ERROR_PATTERN = "error";
export const WARNING_PATTERN = "warn";
