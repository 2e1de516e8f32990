import { z } from "zod/v4";
import { ALLOWED_EXTENSIONS, MAX_CONTAMINATION } from "@/lib/constants";

export const analyzeOptionsSchema = z
  .object({
    fileName: z.string().min(1).max(500).optional(),
    timeoutMs: z.number().int().positive().optional(),
    contamination: z.number().gt(0).max(MAX_CONTAMINATION).optional(),
    seed: z.number().int().nonnegative().optional(),
    exclusiveCounting: z.boolean().optional(),
    maxRecords: z.number().int().positive().optional(),
    minOutputLength: z.number().int().nonnegative().optional(),
    maxOutputLength: z.number().int().positive().optional(),
    runId: z.string().min(1).optional(),
  })
  .refine(
    (o) =>
      o.minOutputLength === undefined ||
      o.maxOutputLength === undefined ||
      o.minOutputLength <= o.maxOutputLength,
    { message: "minOutputLength must not exceed maxOutputLength", path: ["minOutputLength"] },
  );

export type AnalyzeOptions = z.infer<typeof analyzeOptionsSchema>;

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.slice(dot).toLowerCase();
}

export function validateFileExtension(fileName: string): boolean {
  return ALLOWED_EXTENSIONS.includes(fileExtension(fileName));
}

export function sanitizeFileName(fileName: string): string {
  return fileName
    .replace(/[^a-zA-Z0-9._-]/g, "_")
    .replace(/_{2,}/g, "_")
    .slice(0, 200);
}
