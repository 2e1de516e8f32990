/**
 * Summarizer stage.
 *
 * Feeds the text of the first records to the injected summarization
 * capability and bounds the result. A missing provider, a failing call or an
 * abort all degrade to an empty summary plus a SummarizationUnavailable
 * signal; this function never rejects.
 */
import {
  DEFAULT_SUMMARY_MAX_LENGTH,
  DEFAULT_SUMMARY_MAX_RECORDS,
  DEFAULT_SUMMARY_MIN_LENGTH,
} from "@/lib/constants";
import { SummarizationUnavailable, errorMessage } from "@/analysis/errors";
import type { LogRecord, SummaryResult } from "@/analysis/types";
import type { SummarizationCapability } from "./client";

export interface SummarizeOptions {
  capability: SummarizationCapability;
  maxRecords?: number;
  minOutputLength?: number;
  maxOutputLength?: number;
  signal?: AbortSignal;
}

export interface Summarization {
  summary: SummaryResult;
  unavailable: SummarizationUnavailable | null;
}

/** Collapse whitespace and keep at most maxWords words. */
export function clampWords(text: string, maxWords: number): string {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  return words.slice(0, maxWords).join(" ");
}

/**
 * Settle with the promise, or reject as soon as the signal fires.
 * The underlying promise keeps its handlers so a late rejection is not left
 * unhandled.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function unavailable(sourceRecordCount: number, message: string, cause?: unknown): Summarization {
  console.warn(`[Summarizer] ${message}`);
  return {
    summary: { text: "", sourceRecordCount },
    unavailable:
      cause instanceof SummarizationUnavailable
        ? cause
        : new SummarizationUnavailable(message, { cause }),
  };
}

export async function summarizeRecords(
  records: readonly LogRecord[],
  options: SummarizeOptions,
): Promise<Summarization> {
  const {
    capability,
    maxRecords = DEFAULT_SUMMARY_MAX_RECORDS,
    minOutputLength = DEFAULT_SUMMARY_MIN_LENGTH,
    maxOutputLength = DEFAULT_SUMMARY_MAX_LENGTH,
    signal,
  } = options;

  if (records.length === 0) {
    return { summary: { text: "", sourceRecordCount: 0 }, unavailable: null };
  }

  const window = records.slice(0, maxRecords);
  const sourceRecordCount = window.length;
  const input = window.map((r) => r.rawText).join(" ");
  if (!input.trim()) {
    return { summary: { text: "", sourceRecordCount }, unavailable: null };
  }

  if (!capability.isAvailable()) {
    return unavailable(sourceRecordCount, "No summarization provider configured");
  }

  try {
    signal?.throwIfAborted();
    const raw = await raceAbort(
      capability.summarize(input, {
        minLength: minOutputLength,
        maxLength: maxOutputLength,
        signal,
      }),
      signal,
    );
    return {
      summary: { text: clampWords(raw, maxOutputLength), sourceRecordCount },
      unavailable: null,
    };
  } catch (error) {
    return unavailable(
      sourceRecordCount,
      `${capability.providerName()} summarization failed: ${errorMessage(error)}`,
      error,
    );
  }
}

export {
  createSummarizationCapability,
  getSummarizationCapability,
  AnthropicSummarizer,
  OpenAISummarizer,
  NullSummarizer,
  withRetry,
} from "./client";
export type { SummarizationCapability, SummarizeRequest } from "./client";
