/**
 * Isolation forest outlier model.
 *
 * Each tree recursively splits a random sub-sample on a random feature at a
 * random threshold. Outliers sit in sparse regions and get isolated after
 * fewer splits, so a short average path length means a high anomaly score:
 *
 *   s(x) = 2 ^ (-E[h(x)] / c(sampleSize))
 *
 * where c(n) is the average path length of an unsuccessful BST search.
 * Records whose score lies above the (1 - contamination) quantile of the batch
 * are labelled -1 (outlier), everything else 1.
 *
 * Trees live only for the duration of one fitPredict call, so a single
 * instance can be shared across concurrent pipeline runs.
 */

import { createRandom, randomInt, sampleIndices } from "./random";

export type FeatureMatrix = readonly (readonly number[])[];

export interface FitPredictOptions {
  seed: number;
  /** Expected fraction of outliers in the batch, in (0, 0.5] */
  contamination: number;
}

export interface AnomalyPrediction {
  /** -1 for an outlier, 1 for an inlier */
  label: 1 | -1;
  score: number;
}

/** Pluggable outlier model used by the anomaly detector. */
export interface AnomalyModel {
  readonly name: string;
  fitPredict(features: FeatureMatrix, options: FitPredictOptions): AnomalyPrediction[];
}

export interface IsolationForestOptions {
  /** Number of trees */
  nEstimators?: number;
  /** Upper bound on the per-tree sub-sample size */
  maxSamples?: number;
}

type TreeNode =
  | { kind: "leaf"; size: number }
  | { kind: "split"; feature: number; threshold: number; left: TreeNode; right: TreeNode };

const EULER_GAMMA = 0.5772156649015329;

/** Average path length of an unsuccessful search in a BST of n nodes. */
export function averagePathLength(n: number): number {
  if (n > 2) {
    const harmonic = Math.log(n - 1) + EULER_GAMMA;
    return 2 * harmonic - (2 * (n - 1)) / n;
  }
  if (n === 2) return 1;
  return 0;
}

/**
 * Value at quantile q (0..1) of an ascending-sorted array, with linear
 * interpolation between neighbours.
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) throw new Error("quantile of an empty array");
  const pos = q * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

function buildTree(
  features: FeatureMatrix,
  rows: number[],
  depth: number,
  heightLimit: number,
  random: () => number,
): TreeNode {
  if (depth >= heightLimit || rows.length <= 1) {
    return { kind: "leaf", size: rows.length };
  }

  const width = features[rows[0]].length;
  const splittable: { feature: number; min: number; max: number }[] = [];
  for (let f = 0; f < width; f++) {
    let min = Infinity;
    let max = -Infinity;
    for (const r of rows) {
      const v = features[r][f];
      if (v < min) min = v;
      if (v > max) max = v;
    }
    if (max > min) splittable.push({ feature: f, min, max });
  }
  if (splittable.length === 0) {
    return { kind: "leaf", size: rows.length };
  }

  const { feature, min, max } = splittable[randomInt(random, splittable.length)];
  const threshold = min + random() * (max - min);
  const left: number[] = [];
  const right: number[] = [];
  for (const r of rows) {
    (features[r][feature] < threshold ? left : right).push(r);
  }

  return {
    kind: "split",
    feature,
    threshold,
    left: buildTree(features, left, depth + 1, heightLimit, random),
    right: buildTree(features, right, depth + 1, heightLimit, random),
  };
}

function pathLength(point: readonly number[], node: TreeNode, depth: number): number {
  if (node.kind === "leaf") {
    return depth + averagePathLength(node.size);
  }
  const next = point[node.feature] < node.threshold ? node.left : node.right;
  return pathLength(point, next, depth + 1);
}

export class IsolationForest implements AnomalyModel {
  readonly name = "isolation-forest";
  private nEstimators: number;
  private maxSamples: number;

  constructor(options: IsolationForestOptions = {}) {
    this.nEstimators = options.nEstimators ?? 100;
    this.maxSamples = options.maxSamples ?? 256;
    if (!Number.isInteger(this.nEstimators) || this.nEstimators < 1) {
      throw new Error(`nEstimators must be a positive integer, got ${this.nEstimators}`);
    }
    if (!Number.isInteger(this.maxSamples) || this.maxSamples < 2) {
      throw new Error(`maxSamples must be an integer >= 2, got ${this.maxSamples}`);
    }
  }

  /** Anomaly score of every row, fitted on the same rows. */
  scoreSamples(features: FeatureMatrix, seed: number): number[] {
    const n = features.length;
    if (n < 2) throw new Error(`isolation forest needs at least 2 samples, got ${n}`);
    for (const row of features) {
      if (row.length === 0 || !row.every(Number.isFinite)) {
        throw new Error("feature matrix must contain finite, non-empty rows");
      }
    }

    const random = createRandom(seed);
    const sampleSize = Math.min(this.maxSamples, n);
    const heightLimit = Math.ceil(Math.log2(sampleSize));
    const trees: TreeNode[] = [];
    for (let t = 0; t < this.nEstimators; t++) {
      const rows = sampleIndices(random, n, sampleSize);
      trees.push(buildTree(features, rows, 0, heightLimit, random));
    }

    const normaliser = averagePathLength(sampleSize);
    return features.map((point) => {
      let total = 0;
      for (const tree of trees) total += pathLength(point, tree, 0);
      return Math.pow(2, -(total / trees.length) / normaliser);
    });
  }

  fitPredict(features: FeatureMatrix, options: FitPredictOptions): AnomalyPrediction[] {
    const { seed, contamination } = options;
    if (!(contamination > 0 && contamination <= 0.5)) {
      throw new Error(`contamination must be in (0, 0.5], got ${contamination}`);
    }

    const scores = this.scoreSamples(features, seed);
    const threshold = quantile(
      [...scores].sort((a, b) => a - b),
      1 - contamination,
    );

    return scores.map((score): AnomalyPrediction => ({
      label: score > threshold ? -1 : 1,
      score,
    }));
  }
}
