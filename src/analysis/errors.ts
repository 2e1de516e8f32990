import type { StageName, UnavailableField, UnavailableReason } from "./types";

/**
 * Error taxonomy for the analysis pipeline.
 *
 * IngestError is fatal: without records no stage can run. The stage errors are
 * recoverable and end up as "unavailable" markers inside an otherwise complete
 * report.
 */
export class AnalysisError extends Error {
  readonly code: UnavailableReason;

  constructor(code: UnavailableReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class IngestError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IngestError", message, options);
  }
}

export class StageUnavailableError extends AnalysisError {
  readonly stage: StageName;

  constructor(
    stage: StageName,
    code: Exclude<UnavailableReason, "IngestError">,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.stage = stage;
  }
}

export class ClassificationUnavailable extends StageUnavailableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("classification", "ClassificationUnavailable", message, options);
  }
}

export class AnomalyDetectionUnavailable extends StageUnavailableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("anomalyDetection", "AnomalyDetectionUnavailable", message, options);
  }
}

export class SummarizationUnavailable extends StageUnavailableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("summarization", "SummarizationUnavailable", message, options);
  }
}

const STAGE_REASONS: Record<StageName, Exclude<UnavailableReason, "IngestError">> = {
  classification: "ClassificationUnavailable",
  anomalyDetection: "AnomalyDetectionUnavailable",
  summarization: "SummarizationUnavailable",
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert whatever a stage threw into the report marker for that stage.
 * Errors from outside the taxonomy keep their message under the stage's reason.
 */
export function toUnavailableField(stage: StageName, error: unknown): UnavailableField {
  const reason = error instanceof AnalysisError ? error.code : STAGE_REASONS[stage];
  return { status: "unavailable", reason, message: errorMessage(error) };
}
