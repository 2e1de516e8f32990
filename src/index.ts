export { analyzeLog, createAnalysisPipeline, serializeCapability } from "./analysis/pipeline";
export type { AnalysisPipeline, PipelineDependencies } from "./analysis/pipeline";
export { ingestLog, decodeLogBytes } from "./analysis/ingest";
export { classifyRecords, labelRecord } from "./analysis/classifier";
export type { ClassifyOptions } from "./analysis/classifier";
export { detectAnomalies, extractFeatures, getAnomalyModel, IsolationForest } from "./analysis/anomaly";
export type {
  AnomalyDetection,
  AnomalyModel,
  AnomalyPrediction,
  DetectOptions,
  FitPredictOptions,
} from "./analysis/anomaly";
export {
  summarizeRecords,
  createSummarizationCapability,
  getSummarizationCapability,
  AnthropicSummarizer,
  OpenAISummarizer,
  NullSummarizer,
} from "./analysis/summarizer";
export type {
  Summarization,
  SummarizeOptions,
  SummarizationCapability,
  SummarizeRequest,
} from "./analysis/summarizer";
export { buildAnalysisReport, buildFailedReport } from "./analysis/report";
export {
  AnalysisError,
  IngestError,
  StageUnavailableError,
  ClassificationUnavailable,
  AnomalyDetectionUnavailable,
  SummarizationUnavailable,
} from "./analysis/errors";
export { AnalysisEventBus, analysisEvents } from "./lib/analysis-events";
export { loadConfig, getConfig } from "./lib/config";
export type { AnalyserConfig, SummarizerProviderConfig } from "./lib/config";
export type { AnalyzeOptions } from "./lib/validations/analysis";
export type * from "./analysis/types";
