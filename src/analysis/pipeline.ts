import { randomUUID } from "crypto";
import { getConfig, type AnalyserConfig } from "@/lib/config";
import { analysisEvents, type AnalysisEventBus } from "@/lib/analysis-events";
import { createSlotLimiter } from "@/lib/semaphore";
import {
  analyzeOptionsSchema,
  sanitizeFileName,
  type AnalyzeOptions,
} from "@/lib/validations/analysis";
import { ingestLog } from "./ingest";
import { classifyRecords } from "./classifier";
import { detectAnomalies, getAnomalyModel, type AnomalyModel } from "./anomaly";
import {
  getSummarizationCapability,
  summarizeRecords,
  type SummarizationCapability,
} from "./summarizer";
import { IngestError, SummarizationUnavailable, errorMessage, toUnavailableField } from "./errors";
import { buildAnalysisReport, buildFailedReport } from "./report";
import type {
  AnalysisReport,
  IngestResult,
  PipelineEvent,
  StageField,
  StageName,
} from "./types";

/**
 * Analysis pipeline orchestrator.
 *
 * One call to analyze() is one request/response cycle:
 *   1. Ingest the bytes into records. This is the only fatal step; on failure
 *      a FAILED report is returned straight away.
 *   2. Run classification, anomaly detection and summarization concurrently
 *      over the same frozen records. A stage that fails becomes an
 *      "unavailable" marker on the report and does not affect the others.
 *   3. Build the immutable report.
 *
 * The anomaly model and summarization capability are injected (or taken from
 * the process-wide defaults) and never re-created per run. Summarization is
 * the only slow stage and is aborted after the per-run timeout.
 */

export interface PipelineDependencies {
  anomalyModel?: AnomalyModel;
  summarizer?: SummarizationCapability;
  events?: AnalysisEventBus;
  config?: AnalyserConfig;
}

export interface AnalysisPipeline {
  analyze(bytes: Uint8Array, options?: AnalyzeOptions): Promise<AnalysisReport>;
}

/**
 * Wrap a capability that cannot take concurrent calls so that runs queue
 * for it one at a time.
 */
export function serializeCapability(capability: SummarizationCapability): SummarizationCapability {
  if (capability.concurrencySafe) return capability;
  const slot = createSlotLimiter();
  return {
    concurrencySafe: true,
    summarize: (text, request) =>
      slot.run(() => {
        // A run that timed out while queued gives up the slot straight away
        request.signal?.throwIfAborted();
        return capability.summarize(text, request);
      }),
    isAvailable: () => capability.isAvailable(),
    providerName: () => capability.providerName(),
  };
}

export function createAnalysisPipeline(deps: PipelineDependencies = {}): AnalysisPipeline {
  const config = deps.config ?? getConfig();
  const model = deps.anomalyModel ?? getAnomalyModel();
  const summarizer = serializeCapability(deps.summarizer ?? getSummarizationCapability());
  const events = deps.events ?? analysisEvents;

  function emit(event: PipelineEvent): void {
    try {
      events.emit(event);
    } catch (error) {
      // A broken listener must not break the run
      console.error(`[Pipeline] Event listener failed for run ${event.runId}:`, error);
    }
  }

  async function runStage<T>(
    runId: string,
    stage: StageName,
    fn: () => Promise<T>,
  ): Promise<StageField<T>> {
    try {
      const value = await fn();
      emit({ type: "stage-completed", runId, stage });
      return { status: "available", value };
    } catch (error) {
      const marker = toUnavailableField(stage, error);
      console.warn(`[Pipeline] ${stage} unavailable for run ${runId}: ${marker.message}`);
      emit({ type: "stage-unavailable", runId, stage, reason: marker.reason, message: marker.message });
      return marker;
    }
  }

  async function summarizeWithTimeout(
    result: IngestResult,
    options: AnalyzeOptions,
  ) {
    const timeoutMs = options.timeoutMs ?? config.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new SummarizationUnavailable(`Summarization timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    try {
      const { summary, unavailable } = await summarizeRecords(result.records, {
        capability: summarizer,
        maxRecords: options.maxRecords ?? config.maxRecords,
        minOutputLength: options.minOutputLength ?? config.minOutputLength,
        maxOutputLength: options.maxOutputLength ?? config.maxOutputLength,
        signal: controller.signal,
      });
      if (unavailable) throw unavailable;
      return summary;
    } finally {
      clearTimeout(timer);
    }
  }

  async function analyze(
    bytes: Uint8Array,
    rawOptions: AnalyzeOptions = {},
  ): Promise<AnalysisReport> {
    const options = analyzeOptionsSchema.parse(rawOptions);
    const runId = options.runId ?? randomUUID();
    const fileName = options.fileName ? sanitizeFileName(options.fileName) : null;
    const startedAt = Date.now();

    console.log(`[Pipeline] Starting analysis ${runId} (${fileName ?? "unnamed input"}, ${bytes.byteLength} bytes)`);
    emit({ type: "started", runId, fileName });

    // 1. Ingest
    let ingested: IngestResult;
    try {
      ingested = ingestLog(bytes, options.fileName);
    } catch (error) {
      const ingestError =
        error instanceof IngestError ? error : new IngestError(errorMessage(error), { cause: error });
      console.error(`[Pipeline] Ingestion failed for run ${runId}:`, ingestError.message);
      const report = buildFailedReport({
        fileName,
        errorMessage: ingestError.message,
        startedAt,
      });
      emit({ type: "failed", runId, report });
      return report;
    }

    const { records } = ingested;

    // 2. Independent stages
    const [classification, anomalies, summary] = await Promise.all([
      runStage(runId, "classification", async () =>
        classifyRecords(records, {
          exclusive: options.exclusiveCounting ?? config.exclusiveCounting,
        }),
      ),
      runStage(runId, "anomalyDetection", async () => {
        const detection = detectAnomalies(records, {
          contamination: options.contamination ?? config.contamination,
          seed: options.seed ?? config.seed,
          model,
        });
        if (detection.unavailable) throw detection.unavailable;
        return detection.findings;
      }),
      runStage(runId, "summarization", () => summarizeWithTimeout(ingested, options)),
    ]);

    // 3. Report
    const report = buildAnalysisReport({
      fileName,
      format: ingested.format,
      records,
      classification,
      anomalies,
      summary,
      startedAt,
    });

    const anomalyCount = report.anomalies.status === "available" ? report.anomalies.value.length : "n/a";
    console.log(
      `[Pipeline] Analysis ${runId} completed: ${records.length} records, ${anomalyCount} anomalies, ` +
        `${report.analysisEndedAt - startedAt}ms`,
    );
    emit({ type: "completed", runId, report });
    return report;
  }

  return { analyze };
}

let _defaultPipeline: AnalysisPipeline | null = null;

/**
 * Analyze with the process-wide default pipeline (configuration, model and
 * summarizer from the environment, built on first use).
 */
export async function analyzeLog(bytes: Uint8Array, options?: AnalyzeOptions): Promise<AnalysisReport> {
  if (!_defaultPipeline) _defaultPipeline = createAnalysisPipeline();
  return _defaultPipeline.analyze(bytes, options);
}
