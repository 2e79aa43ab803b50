/**
 * Turns an assistant reply (analysis prose followed by one JSON object) into a ParsedResponse.
 *
 * Extraction is a best-effort heuristic, not a parser: the candidate runs from the first "{" to the
 * last "}". Braces in the prose before the payload, or a second object after it, produce a wrong
 * candidate, which then fails to decode and falls back like any other unparseable reply.
 */

import { z } from "zod";
import { logger } from "../logging";
import { isLikelyCodeRequest } from "./classifier";
import { sortModifications } from "./modification-normalizer";
import type { FileChange, GeneratedFile, Modification, ParsedResponse } from "./types";

const lineNumber = z.number().int().positive();

/**
 * Model-side shape of one edit. `old_content` from older prompt variants is accepted and never
 * copied into the result.
 */
const RawModificationSchema = z
  .discriminatedUnion("operation", [
    z.object({
      operation: z.literal("replace"),
      start_line: lineNumber,
      end_line: lineNumber,
      new_content: z.string(),
      old_content: z.unknown().optional(),
    }),
    z.object({
      operation: z.literal("insert"),
      start_line: lineNumber,
      new_content: z.string(),
      old_content: z.unknown().optional(),
    }),
    z.object({
      operation: z.literal("insert_before"),
      start_line: lineNumber,
      new_content: z.string(),
      old_content: z.unknown().optional(),
    }),
    z.object({
      operation: z.literal("delete"),
      start_line: lineNumber,
      end_line: lineNumber,
      old_content: z.unknown().optional(),
    }),
  ])
  .refine((m) => !("end_line" in m) || m.end_line >= m.start_line, { message: "end_line is before start_line" });

type RawModification = z.infer<typeof RawModificationSchema>;

const RawFileChangeSchema = z.object({
  file: z.string().min(1),
  modifications: z.array(z.unknown()).default([]),
});

const RawGeneratedFileSchema = z.object({
  file: z.string().min(1),
  content: z.string(),
});

function toModification(raw: RawModification): Modification {
  switch (raw.operation) {
    case "replace":
      return { operation: "replace", startLine: raw.start_line, endLine: raw.end_line, newContent: raw.new_content };
    case "insert":
      return { operation: "insert", startLine: raw.start_line, newContent: raw.new_content };
    case "insert_before":
      return { operation: "insert_before", startLine: raw.start_line, newContent: raw.new_content };
    case "delete":
      return { operation: "delete", startLine: raw.start_line, endLine: raw.end_line };
  }
}

/** Substring from the first "{" to the last "}", inclusive; undefined when there is no such span. */
export function extractJsonCandidate(text: string): string | undefined {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) return undefined;
  return text.slice(start, end + 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" ? v : undefined;
}

function arrayField(obj: Record<string, unknown>, key: string): unknown[] {
  const v = obj[key];
  return Array.isArray(v) ? v : [];
}

function reportDrift(detail: string, fields: Record<string, unknown> = {}): void {
  logger.warn({ event: "RESPONSE_SHAPE_DRIFT", detail, ...fields }, "Model reply deviates from the expected shape");
}

function parseGeneratedFiles(entries: unknown[]): GeneratedFile[] {
  const files: GeneratedFile[] = [];
  entries.forEach((entry, index) => {
    const res = RawGeneratedFileSchema.safeParse(entry);
    if (res.success) {
      files.push({ path: res.data.file, content: res.data.content });
    } else {
      reportDrift("dropped generated file entry", { index, issues: res.error.issues.map((i) => i.message) });
    }
  });
  return files;
}

function parseFileChanges(entries: unknown[]): FileChange[] {
  const changes: FileChange[] = [];
  entries.forEach((entry, index) => {
    const res = RawFileChangeSchema.safeParse(entry);
    if (!res.success) {
      reportDrift("dropped file change entry", { index, issues: res.error.issues.map((i) => i.message) });
      return;
    }
    const modifications: Modification[] = [];
    res.data.modifications.forEach((rawMod, modIndex) => {
      const mod = RawModificationSchema.safeParse(rawMod);
      if (mod.success) {
        modifications.push(toModification(mod.data));
      } else {
        reportDrift("dropped modification", {
          file: res.data.file,
          index: modIndex,
          issues: mod.error.issues.map((i) => i.message),
        });
      }
    });
    changes.push({ file: res.data.file, modifications });
  });
  return changes;
}

/** Model-format JSON of a generation, as kept for later modification requests. */
export function serializeGeneration(files: GeneratedFile[], summary: string): string {
  return JSON.stringify(
    { type: "code_generation", changes: files.map((f) => ({ file: f.path, content: f.content })), summary },
    null,
    2
  );
}

export type DecodeResult =
  | { ok: true; parsed: ParsedResponse; generationPayload?: string }
  | { ok: false; reason: string };

/**
 * Shape a decoded JSON object by its `type` tag. A missing or unknown tag is read with the
 * code_generation shape but never becomes the session's last generated code.
 */
export function interpretPayload(obj: Record<string, unknown>): DecodeResult {
  const type = stringField(obj, "type");
  const summary = stringField(obj, "summary") ?? "";

  switch (type) {
    case "code_changes": {
      const changes = sortModifications(parseFileChanges(arrayField(obj, "changes")));
      return { ok: true, parsed: { kind: "code_changes", changes, summary } };
    }
    case "conversation":
      return { ok: true, parsed: { kind: "conversation", message: stringField(obj, "message") ?? summary } };
    case "error":
      return { ok: true, parsed: { kind: "error", message: stringField(obj, "error") ?? summary } };
    case "code_generation": {
      const files = parseGeneratedFiles(arrayField(obj, "changes"));
      return {
        ok: true,
        parsed: { kind: "code_generation", files, summary },
        generationPayload: serializeGeneration(files, summary),
      };
    }
    default:
      reportDrift(type === undefined ? "missing type; treating as code_generation" : "unknown type; treating as code_generation", {
        type,
      });
      return { ok: true, parsed: { kind: "code_generation", files: parseGeneratedFiles(arrayField(obj, "changes")), summary } };
  }
}

export function decodeReply(text: string): DecodeResult {
  const candidate = extractJsonCandidate(text);
  if (candidate === undefined) return { ok: false, reason: "No JSON found" };
  let decoded: unknown;
  try {
    decoded = JSON.parse(candidate);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  if (!isRecord(decoded)) return { ok: false, reason: "JSON payload is not an object" };
  return interpretPayload(decoded);
}

export interface ReplyInterpretation {
  parsed: ParsedResponse;
  /** Set only for an explicitly typed code_generation: what the session keeps as its last generated code. */
  generationPayload?: string;
}

/**
 * Decode the reply; when that fails, report it as an error if the query wanted code and as plain
 * conversation otherwise. Both fallbacks carry the trimmed reply text.
 */
export function interpretReply(text: string, query: string): ReplyInterpretation {
  const res = decodeReply(text);
  if (res.ok) return { parsed: res.parsed, generationPayload: res.generationPayload };
  if (!isLikelyCodeRequest(query)) {
    return { parsed: { kind: "conversation", message: text.trim() } };
  }
  return {
    parsed: {
      kind: "error",
      message: text.trim(),
      reason: `Expected code but received unexpected response: ${res.reason}`,
    },
  };
}
