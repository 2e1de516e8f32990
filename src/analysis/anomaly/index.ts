import { DEFAULT_CONTAMINATION, DEFAULT_SEED, MAX_CONTAMINATION } from "@/lib/constants";
import { AnomalyDetectionUnavailable, errorMessage } from "@/analysis/errors";
import type { AnomalyFinding, LogRecord } from "@/analysis/types";
import { IsolationForest, type AnomalyModel, type AnomalyPrediction } from "./isolation-forest";

export interface DetectOptions {
  contamination?: number;
  seed?: number;
  model?: AnomalyModel;
}

export interface AnomalyDetection {
  /** One finding per record, ordered by record index */
  findings: AnomalyFinding[];
  unavailable: AnomalyDetectionUnavailable | null;
}

/** Score given to every record of a batch in which no split is possible */
const UNIFORM_SCORE = 0.5;

let _sharedModel: AnomalyModel | null = null;

/** Process-wide default model, created on first use. */
export function getAnomalyModel(): AnomalyModel {
  if (_sharedModel) return _sharedModel;
  _sharedModel = new IsolationForest();
  return _sharedModel;
}

/** Single scalar feature per record: the length of its text in code points. */
export function extractFeatures(records: readonly LogRecord[]): number[][] {
  return records.map((r) => [[...r.rawText].length]);
}

function unavailable(message: string, cause?: unknown): AnomalyDetection {
  const error = new AnomalyDetectionUnavailable(message, { cause });
  console.warn(`[Anomaly] ${message}`);
  return { findings: [], unavailable: error };
}

/**
 * Score every record with an outlier model fitted on the current batch.
 *
 * Never throws: invalid parameters or a failing model yield no findings and
 * an AnomalyDetectionUnavailable signal instead.
 */
export function detectAnomalies(
  records: readonly LogRecord[],
  options: DetectOptions = {},
): AnomalyDetection {
  const contamination = options.contamination ?? DEFAULT_CONTAMINATION;
  const seed = options.seed ?? DEFAULT_SEED;
  const model = options.model ?? getAnomalyModel();

  if (!(contamination > 0 && contamination <= MAX_CONTAMINATION)) {
    return unavailable(`contamination must be in (0, ${MAX_CONTAMINATION}], got ${contamination}`);
  }
  if (!Number.isInteger(seed) || seed < 0) {
    return unavailable(`seed must be a non-negative integer, got ${seed}`);
  }

  if (records.length < 2) {
    return { findings: [], unavailable: null };
  }

  const features = extractFeatures(records);
  const first = features[0][0];
  if (features.every(([length]) => length === first)) {
    return {
      findings: records.map((r) => ({
        recordIndex: r.index,
        score: UNIFORM_SCORE,
        isAnomalous: false,
      })),
      unavailable: null,
    };
  }

  let predictions: AnomalyPrediction[];
  try {
    predictions = model.fitPredict(features, { seed, contamination });
  } catch (error) {
    return unavailable(`${model.name} failed: ${errorMessage(error)}`, error);
  }

  if (predictions.length !== records.length) {
    return unavailable(
      `${model.name} returned ${predictions.length} predictions for ${records.length} records`,
    );
  }

  return {
    findings: records.map((r, i) => ({
      recordIndex: r.index,
      score: predictions[i].score,
      isAnomalous: predictions[i].label === -1,
    })),
    unavailable: null,
  };
}

export { IsolationForest } from "./isolation-forest";
export type { AnomalyModel, AnomalyPrediction, FitPredictOptions } from "./isolation-forest";
