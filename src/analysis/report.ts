import { PREVIEW_LINE_LENGTH, PREVIEW_SIZE } from "@/lib/constants";
import { labelRecord } from "./classifier";
import type {
  AnalysisReport,
  AnomalyFinding,
  ClassificationResult,
  LogFormat,
  LogRecord,
  RecordPreview,
  StageField,
  SummaryResult,
} from "./types";
import { deepFreeze, truncateLine } from "./utils";

export interface ReportInput {
  fileName: string | null;
  format: LogFormat;
  records: readonly LogRecord[];
  classification: StageField<ClassificationResult>;
  /** Every finding the detector produced, anomalous or not */
  anomalies: StageField<readonly AnomalyFinding[]>;
  summary: StageField<SummaryResult>;
  startedAt: number;
  endedAt?: number;
}

export interface FailedReportInput {
  fileName: string | null;
  errorMessage: string;
  startedAt: number;
  endedAt?: number;
}

export function buildPreview(records: readonly LogRecord[]): RecordPreview[] {
  return records.slice(0, PREVIEW_SIZE).map((record) => ({
    index: record.index,
    text: truncateLine(record.rawText, PREVIEW_LINE_LENGTH),
    label: labelRecord(record),
  }));
}

/** Keep anomalous findings only, in record order. */
export function selectAnomalies(findings: readonly AnomalyFinding[]): AnomalyFinding[] {
  return findings
    .filter((f) => f.isAnomalous)
    .map((f) => ({ ...f }))
    .sort((a, b) => a.recordIndex - b.recordIndex);
}

/** Shallow copy of a stage field, so freezing the report leaves the caller's values alone. */
function copyField<T extends object>(field: StageField<T>): StageField<T> {
  return field.status === "available"
    ? { status: "available", value: { ...field.value } }
    : { ...field };
}

/**
 * Assemble the immutable report of a run whose ingestion succeeded.
 * Stage fields pass through as given; unavailable stages keep their marker.
 */
export function buildAnalysisReport(input: ReportInput): AnalysisReport {
  const anomalies: StageField<readonly AnomalyFinding[]> =
    input.anomalies.status === "available"
      ? { status: "available", value: selectAnomalies(input.anomalies.value) }
      : { ...input.anomalies };

  return deepFreeze<AnalysisReport>({
    status: "COMPLETED",
    fileName: input.fileName,
    logFormat: input.format,
    totalRecords: input.records.length,
    preview: buildPreview(input.records),
    classification: copyField(input.classification),
    anomalies,
    summary: copyField(input.summary),
    errorMessage: null,
    analysisStartedAt: input.startedAt,
    analysisEndedAt: input.endedAt ?? Date.now(),
  });
}

/**
 * Report for a run that never produced records. Every stage is marked
 * unavailable with the ingest error as the reason.
 */
export function buildFailedReport(input: FailedReportInput): AnalysisReport {
  const marker = () => ({
    status: "unavailable" as const,
    reason: "IngestError" as const,
    message: input.errorMessage,
  });

  return deepFreeze<AnalysisReport>({
    status: "FAILED",
    fileName: input.fileName,
    logFormat: null,
    totalRecords: 0,
    preview: [],
    classification: marker(),
    anomalies: marker(),
    summary: marker(),
    errorMessage: input.errorMessage,
    analysisStartedAt: input.startedAt,
    analysisEndedAt: input.endedAt ?? Date.now(),
  });
}
