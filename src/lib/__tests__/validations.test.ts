import { describe, it, expect } from "vitest";
import {
  analyzeOptionsSchema,
  fileExtension,
  sanitizeFileName,
  validateFileExtension,
} from "../validations/analysis";

describe("validateFileExtension", () => {
  it("accepts .txt files", () => {
    expect(validateFileExtension("server.txt")).toBe(true);
  });

  it("accepts .log files", () => {
    expect(validateFileExtension("access.log")).toBe(true);
  });

  it("accepts .csv files", () => {
    expect(validateFileExtension("data.csv")).toBe(true);
  });

  it("accepts .jsonl files", () => {
    expect(validateFileExtension("events.jsonl")).toBe(true);
  });

  it("rejects .exe files", () => {
    expect(validateFileExtension("malware.exe")).toBe(false);
  });

  it("rejects files with no extension", () => {
    expect(validateFileExtension("noextension")).toBe(false);
  });

  it("handles uppercase extensions", () => {
    expect(validateFileExtension("data.TXT")).toBe(true);
  });
});

describe("fileExtension", () => {
  it("returns the lowercased last extension", () => {
    expect(fileExtension("archive.2024.LOG")).toBe(".log");
  });

  it("returns an empty string without a dot", () => {
    expect(fileExtension("README")).toBe("");
  });
});

describe("sanitizeFileName", () => {
  it("replaces unsafe characters with underscores", () => {
    expect(sanitizeFileName("my file (1).log")).toBe("my_file_1_.log");
  });

  it("collapses path separators", () => {
    expect(sanitizeFileName("../../etc/passwd")).toBe(".._.._etc_passwd");
  });

  it("caps the length at 200 characters", () => {
    expect(sanitizeFileName("a".repeat(300) + ".log")).toHaveLength(200);
  });
});

describe("analyzeOptionsSchema", () => {
  it("accepts an empty options object", () => {
    expect(analyzeOptionsSchema.parse({})).toEqual({});
  });

  it("accepts contamination at the upper bound", () => {
    expect(analyzeOptionsSchema.parse({ contamination: 0.5 })).toEqual({ contamination: 0.5 });
  });

  it("rejects contamination of zero", () => {
    expect(analyzeOptionsSchema.safeParse({ contamination: 0 }).success).toBe(false);
  });

  it("rejects a negative seed", () => {
    expect(analyzeOptionsSchema.safeParse({ seed: -1 }).success).toBe(false);
  });

  it("rejects a non-integer timeout", () => {
    expect(analyzeOptionsSchema.safeParse({ timeoutMs: 1.5 }).success).toBe(false);
  });

  it("rejects minOutputLength above maxOutputLength", () => {
    const result = analyzeOptionsSchema.safeParse({ minOutputLength: 80, maxOutputLength: 40 });
    expect(result.success).toBe(false);
  });
});
