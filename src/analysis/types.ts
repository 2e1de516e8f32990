export type LogFormat = "csv" | "jsonl" | "plain";

export interface LogRecord {
  /** 0-based position in the ingested sequence */
  readonly index: number;
  readonly rawText: string;
}

export interface IngestResult {
  records: readonly LogRecord[];
  format: LogFormat;
}

export type CountingMode = "non-exclusive" | "exclusive";

export interface ClassificationResult {
  total: number;
  errorCount: number;
  warningCount: number;
  /** Records matching neither the error nor the warning pattern */
  normalCount: number;
  mode: CountingMode;
}

export interface AnomalyFinding {
  recordIndex: number;
  /** Isolation-forest anomaly score in (0, 1]; higher is more anomalous */
  score: number;
  isAnomalous: boolean;
}

export interface SummaryResult {
  text: string;
  sourceRecordCount: number;
}

export type UnavailableReason =
  | "IngestError"
  | "ClassificationUnavailable"
  | "AnomalyDetectionUnavailable"
  | "SummarizationUnavailable";

export type StageName = "classification" | "anomalyDetection" | "summarization";

export interface UnavailableField {
  status: "unavailable";
  reason: UnavailableReason;
  message: string;
}

export type StageField<T> = { status: "available"; value: T } | UnavailableField;

export type ReportStatus = "COMPLETED" | "FAILED";

export type RecordLabel = "ERROR" | "WARNING" | "NORMAL";

export interface RecordPreview {
  index: number;
  /** Record text, truncated for display */
  text: string;
  label: RecordLabel;
}

export interface AnalysisReport {
  readonly status: ReportStatus;
  readonly fileName: string | null;
  readonly logFormat: LogFormat | null;
  readonly totalRecords: number;
  readonly preview: readonly Readonly<RecordPreview>[];
  readonly classification: Readonly<StageField<ClassificationResult>>;
  /** Anomalous findings only, ordered by record index */
  readonly anomalies: Readonly<StageField<readonly Readonly<AnomalyFinding>[]>>;
  readonly summary: Readonly<StageField<SummaryResult>>;
  readonly errorMessage: string | null;
  /** Epoch ms */
  readonly analysisStartedAt: number;
  readonly analysisEndedAt: number;
}

export type PipelineEvent =
  | { type: "started"; runId: string; fileName: string | null }
  | { type: "stage-completed"; runId: string; stage: StageName }
  | { type: "stage-unavailable"; runId: string; stage: StageName; reason: UnavailableReason; message: string }
  | { type: "completed"; runId: string; report: AnalysisReport }
  | { type: "failed"; runId: string; report: AnalysisReport };
