import { describe, it, expect, vi, beforeEach } from "vitest";
import { detectAnomalies, extractFeatures, type AnomalyModel } from "../index";
import { AnomalyDetectionUnavailable } from "@/analysis/errors";
import type { LogRecord } from "@/analysis/types";

function records(texts: string[]): LogRecord[] {
  return texts.map((rawText, index) => ({ index, rawText }));
}

function twentyLinesWithOneLongOutlier(): LogRecord[] {
  const texts = Array.from({ length: 20 }, (_, i) => `INFO request ${i}`);
  texts[13] = texts[13] + "x".repeat(500);
  return records(texts);
}

describe("extractFeatures", () => {
  it("maps each record to its text length", () => {
    expect(extractFeatures(records(["ab", "", "abcd"]))).toEqual([[2], [0], [4]]);
  });

  it("counts characters outside the BMP once", () => {
    expect(extractFeatures(records(["🔥🔥", "héllo"]))).toEqual([[2], [5]]);
  });
});

describe("detectAnomalies", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("returns no findings for fewer than two records", () => {
    expect(detectAnomalies([])).toEqual({ findings: [], unavailable: null });
    expect(detectAnomalies(records(["only line"]))).toEqual({ findings: [], unavailable: null });
  });

  it("flags nothing when every record has the same length", () => {
    const model: AnomalyModel = { name: "spy", fitPredict: vi.fn() };
    const result = detectAnomalies(records(["aaaa", "bbbb", "cccc", "dddd", "eeee"]), { model });

    expect(result.unavailable).toBeNull();
    expect(result.findings).toHaveLength(5);
    expect(result.findings.every((f) => !f.isAnomalous)).toBe(true);
    expect(model.fitPredict).not.toHaveBeenCalled();
  });

  it("flags a line 500 characters longer than the rest", () => {
    const result = detectAnomalies(twentyLinesWithOneLongOutlier(), { contamination: 0.1 });

    expect(result.unavailable).toBeNull();
    expect(result.findings).toHaveLength(20);
    expect(result.findings[13]).toMatchObject({ recordIndex: 13, isAnomalous: true });
    expect(result.findings.filter((f) => f.isAnomalous).length).toBeLessThanOrEqual(2);
  });

  it("returns one finding per record in index order", () => {
    const result = detectAnomalies(twentyLinesWithOneLongOutlier());
    expect(result.findings.map((f) => f.recordIndex)).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it("is deterministic for the same records, seed and contamination", () => {
    const input = twentyLinesWithOneLongOutlier();
    const first = detectAnomalies(input, { seed: 11, contamination: 0.1 });
    const second = detectAnomalies(input, { seed: 11, contamination: 0.1 });
    expect(second).toEqual(first);
  });

  it("passes seed and contamination to the model", () => {
    const fitPredict = vi.fn().mockReturnValue([
      { label: 1, score: 0.4 },
      { label: -1, score: 0.9 },
    ]);
    const result = detectAnomalies(records(["a", "abcdef"]), {
      model: { name: "fake", fitPredict },
      seed: 5,
      contamination: 0.25,
    });

    expect(fitPredict).toHaveBeenCalledWith([[1], [6]], { seed: 5, contamination: 0.25 });
    expect(result.findings).toEqual([
      { recordIndex: 0, score: 0.4, isAnomalous: false },
      { recordIndex: 1, score: 0.9, isAnomalous: true },
    ]);
  });

  it("signals AnomalyDetectionUnavailable when the model throws", () => {
    const model: AnomalyModel = {
      name: "broken",
      fitPredict: () => {
        throw new Error("singular matrix");
      },
    };
    const result = detectAnomalies(records(["a", "abc"]), { model });

    expect(result.findings).toEqual([]);
    expect(result.unavailable).toBeInstanceOf(AnomalyDetectionUnavailable);
    expect(result.unavailable?.message).toBe("broken failed: singular matrix");
  });

  it("signals AnomalyDetectionUnavailable when the model returns the wrong number of labels", () => {
    const model: AnomalyModel = { name: "short", fitPredict: () => [{ label: 1, score: 0.5 }] };
    const result = detectAnomalies(records(["a", "abc", "abcdef"]), { model });

    expect(result.findings).toEqual([]);
    expect(result.unavailable?.message).toBe("short returned 1 predictions for 3 records");
  });

  it("signals AnomalyDetectionUnavailable for contamination out of range", () => {
    const result = detectAnomalies(records(["a", "abc"]), { contamination: 0.7 });
    expect(result.findings).toEqual([]);
    expect(result.unavailable?.message).toBe("contamination must be in (0, 0.5], got 0.7");
  });

  it("signals AnomalyDetectionUnavailable for a negative seed", () => {
    const result = detectAnomalies(records(["a", "abc"]), { seed: -3 });
    expect(result.unavailable?.message).toBe("seed must be a non-negative integer, got -3");
  });
});
