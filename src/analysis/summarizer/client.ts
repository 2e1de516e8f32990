import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { setTimeout as sleep } from "timers/promises";
import { getConfig, type SummarizerProviderConfig } from "@/lib/config";
import { SummarizationUnavailable } from "@/analysis/errors";
import { SYSTEM_PROMPT, buildSummaryPrompt } from "./prompt";

export interface SummarizeRequest {
  /** Lower bound on the summary length, in words */
  minLength: number;
  /** Upper bound on the summary length, in words */
  maxLength: number;
  signal?: AbortSignal;
}

/**
 * Pluggable abstractive summarization. Implementations are created once per
 * process and shared by every pipeline run.
 */
export interface SummarizationCapability {
  summarize(text: string, request: SummarizeRequest): Promise<string>;
  isAvailable(): boolean;
  providerName(): string;
  /** Whether summarize() may be called again before a previous call settles */
  readonly concurrencySafe: boolean;
}

interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  signal?: AbortSignal;
}

/**
 * Retry wrapper with exponential backoff and 429 handling.
 * Respects Retry-After header when available. Never retries once the
 * signal has fired.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 1000, signal } = opts;

  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxRetries || signal?.aborted) throw error;

      // Check for rate limit (429) or transient server errors (5xx)
      const status = getErrorStatus(error);
      const isRetryable = status === 429 || (status !== null && status >= 500);

      if (!isRetryable && status !== null) throw error;

      let delayMs = baseDelayMs * Math.pow(2, attempt);
      const retryAfter = getRetryAfter(error);
      if (retryAfter !== null) {
        delayMs = Math.max(delayMs, retryAfter * 1000);
      }

      console.warn(
        `[LLM] Request failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${Math.round(delayMs)}ms...`,
        status ? `status=${status}` : ""
      );
      await sleep(delayMs, undefined, { signal });
    }
  }
}

export function getErrorStatus(error: unknown): number | null {
  if (error && typeof error === "object") {
    if ("status" in error && typeof error.status === "number") {
      return error.status;
    }
    if ("statusCode" in error && typeof error.statusCode === "number") {
      return error.statusCode;
    }
  }
  return null;
}

function readHeader(headers: unknown, name: string): string | null {
  if (!headers || typeof headers !== "object") return null;
  // SDK errors carry either a fetch Headers instance or a plain record
  if ("get" in headers && typeof headers.get === "function") {
    const value: unknown = headers.get(name);
    return typeof value === "string" ? value : null;
  }
  const value: unknown = Object.entries(headers).find(
    ([key]) => key.toLowerCase() === name,
  )?.[1];
  return typeof value === "string" ? value : null;
}

export function getRetryAfter(error: unknown): number | null {
  if (error && typeof error === "object" && "headers" in error) {
    const val = readHeader(error.headers, "retry-after");
    if (val) {
      const seconds = parseFloat(val);
      if (!isNaN(seconds)) return seconds;
    }
  }
  return null;
}

/** Token budget for a summary of at most maxWords words. */
function maxTokensFor(maxWords: number): number {
  return Math.max(256, maxWords * 3);
}

export class AnthropicSummarizer implements SummarizationCapability {
  readonly concurrencySafe = true;
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
  }

  async summarize(text: string, request: SummarizeRequest): Promise<string> {
    return withRetry(
      async () => {
        const message = await this.client.messages.create(
          {
            model: this.model,
            max_tokens: maxTokensFor(request.maxLength),
            system: SYSTEM_PROMPT,
            messages: [
              {
                role: "user",
                content: buildSummaryPrompt(text, request.minLength, request.maxLength),
              },
            ],
          },
          { signal: request.signal },
        );

        return message.content
          .map((block) => (block.type === "text" ? block.text : ""))
          .join("");
      },
      { signal: request.signal },
    );
  }

  isAvailable(): boolean {
    return true;
  }

  providerName(): string {
    return "Anthropic Claude";
  }
}

export class OpenAISummarizer implements SummarizationCapability {
  readonly concurrencySafe = true;
  private client: OpenAI;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
  }

  async summarize(text: string, request: SummarizeRequest): Promise<string> {
    return withRetry(
      async () => {
        const response = await this.client.chat.completions.create(
          {
            model: this.model,
            max_tokens: maxTokensFor(request.maxLength),
            messages: [
              { role: "system", content: SYSTEM_PROMPT },
              {
                role: "user",
                content: buildSummaryPrompt(text, request.minLength, request.maxLength),
              },
            ],
          },
          { signal: request.signal },
        );

        return response.choices[0]?.message?.content || "";
      },
      { signal: request.signal },
    );
  }

  isAvailable(): boolean {
    return true;
  }

  providerName(): string {
    return "OpenAI";
  }
}

export class NullSummarizer implements SummarizationCapability {
  readonly concurrencySafe = true;

  async summarize(): Promise<string> {
    throw new SummarizationUnavailable("No summarization provider configured");
  }
  isAvailable(): boolean {
    return false;
  }
  providerName(): string {
    return "None";
  }
}

export function createSummarizationCapability(
  config: SummarizerProviderConfig | null,
): SummarizationCapability {
  if (!config) return new NullSummarizer();
  if (config.provider === "anthropic") {
    return new AnthropicSummarizer(config.apiKey, config.model);
  }
  return new OpenAISummarizer(config.apiKey, config.model);
}

let _sharedCapability: SummarizationCapability | null = null;

/**
 * Process-wide summarization capability, built from the environment on
 * first use and reused by every run afterwards.
 */
export function getSummarizationCapability(): SummarizationCapability {
  if (_sharedCapability) return _sharedCapability;
  _sharedCapability = createSummarizationCapability(getConfig().summarizer);
  console.log(`[LLM] Summarization provider: ${_sharedCapability.providerName()}`);
  return _sharedCapability;
}
