import { z } from "zod/v4";
import {
  DEFAULT_ANALYSIS_TIMEOUT_MS,
  DEFAULT_CONTAMINATION,
  DEFAULT_SEED,
  DEFAULT_SUMMARY_MAX_LENGTH,
  DEFAULT_SUMMARY_MAX_RECORDS,
  DEFAULT_SUMMARY_MIN_LENGTH,
  MAX_CONTAMINATION,
} from "@/lib/constants";

const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const booleanFlag = z.preprocess(
  emptyAsUndefined,
  z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1"),
);

const envSchema = z.object({
  SUMMARIZER_PROVIDER: z.preprocess(emptyAsUndefined, z.enum(["anthropic", "openai"]).optional()),
  ANTHROPIC_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  OPENAI_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  ANTHROPIC_MODEL: z.preprocess(emptyAsUndefined, z.string().default("claude-sonnet-4-20250514")),
  OPENAI_MODEL: z.preprocess(emptyAsUndefined, z.string().default("gpt-4o-mini")),
  ANALYSIS_TIMEOUT_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_ANALYSIS_TIMEOUT_MS),
  ),
  ANOMALY_CONTAMINATION: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().gt(0).max(MAX_CONTAMINATION).default(DEFAULT_CONTAMINATION),
  ),
  ANOMALY_SEED: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_SEED),
  ),
  SUMMARY_MAX_RECORDS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_SUMMARY_MAX_RECORDS),
  ),
  SUMMARY_MIN_LENGTH: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_SUMMARY_MIN_LENGTH),
  ),
  SUMMARY_MAX_LENGTH: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_SUMMARY_MAX_LENGTH),
  ),
  CLASSIFIER_EXCLUSIVE_COUNTING: booleanFlag,
});

export interface SummarizerProviderConfig {
  provider: "anthropic" | "openai";
  apiKey: string;
  model: string;
}

export interface AnalyserConfig {
  summarizer: SummarizerProviderConfig | null;
  timeoutMs: number;
  contamination: number;
  seed: number;
  maxRecords: number;
  minOutputLength: number;
  maxOutputLength: number;
  exclusiveCounting: boolean;
}

/**
 * Pick the summarization provider. An explicit SUMMARIZER_PROVIDER wins;
 * otherwise whichever API key is present, Anthropic first.
 */
function resolveSummarizer(env: z.infer<typeof envSchema>): SummarizerProviderConfig | null {
  const anthropic = env.ANTHROPIC_API_KEY
    ? { provider: "anthropic" as const, apiKey: env.ANTHROPIC_API_KEY, model: env.ANTHROPIC_MODEL }
    : null;
  const openai = env.OPENAI_API_KEY
    ? { provider: "openai" as const, apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL }
    : null;

  if (env.SUMMARIZER_PROVIDER === "anthropic") return anthropic;
  if (env.SUMMARIZER_PROVIDER === "openai") return openai;
  return anthropic ?? openai;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnalyserConfig {
  const parsed = envSchema.parse(env);

  if (parsed.SUMMARY_MIN_LENGTH > parsed.SUMMARY_MAX_LENGTH) {
    throw new Error(
      `SUMMARY_MIN_LENGTH (${parsed.SUMMARY_MIN_LENGTH}) must not exceed SUMMARY_MAX_LENGTH (${parsed.SUMMARY_MAX_LENGTH})`,
    );
  }

  return {
    summarizer: resolveSummarizer(parsed),
    timeoutMs: parsed.ANALYSIS_TIMEOUT_MS,
    contamination: parsed.ANOMALY_CONTAMINATION,
    seed: parsed.ANOMALY_SEED,
    maxRecords: parsed.SUMMARY_MAX_RECORDS,
    minOutputLength: parsed.SUMMARY_MIN_LENGTH,
    maxOutputLength: parsed.SUMMARY_MAX_LENGTH,
    exclusiveCounting: parsed.CLASSIFIER_EXCLUSIVE_COUNTING,
  };
}

let _config: AnalyserConfig | null = null;

/** Process-wide configuration, read from the environment on first use. */
export function getConfig(): AnalyserConfig {
  if (_config) return _config;
  _config = loadConfig();
  return _config;
}
