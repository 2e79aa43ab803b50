/**
 * Request/response types for one chat turn, plus the structured result of parsing a model reply.
 */

import { z } from "zod";
import type { ProviderId, TokenUsage } from "../adapters/llm/types";

export interface WorkspaceNode {
  name: string;
  /** "file" or "folder" as sent by the editor; not otherwise interpreted. */
  type: string;
  children?: WorkspaceNode[];
}

export const WorkspaceNodeSchema: z.ZodType<WorkspaceNode> = z.lazy(() =>
  z.object({
    name: z.string(),
    type: z.string(),
    children: z.array(WorkspaceNodeSchema).optional(),
  })
);

export const WorkspaceTreeSchema = z.object({
  root: z.string(),
  children: z.array(WorkspaceNodeSchema),
});

export const FileContextSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export const ChatContextSchema = z.object({
  openFiles: z.array(FileContextSchema).optional(),
  workspaceTree: WorkspaceTreeSchema.optional(),
});

export const ChatRequestSchema = z.object({
  query: z.string().min(1, "query must not be empty"),
  context: ChatContextSchema.optional(),
  sessionId: z.string().min(1).default("default"),
  modelName: z.string().min(1).optional(),
});

export const ResetRequestSchema = z.object({
  sessionId: z.string().min(1).default("default"),
});

type WorkspaceTree = z.infer<typeof WorkspaceTreeSchema>;
export type ChatContext = z.infer<typeof ChatContextSchema>;
export type ChatRequest = z.output<typeof ChatRequestSchema>;

/** Line edit against the ORIGINAL numbering of its file (1-indexed, endLine inclusive). */
export type Modification =
  | { operation: "replace"; startLine: number; endLine: number; newContent: string }
  | { operation: "insert"; startLine: number; newContent: string }
  | { operation: "insert_before"; startLine: number; newContent: string }
  | { operation: "delete"; startLine: number; endLine: number };

export interface FileChange {
  file: string;
  modifications: Modification[];
}

export interface GeneratedFile {
  path: string;
  content: string;
}

export type ParsedResponse =
  | { kind: "code_generation"; files: GeneratedFile[]; summary: string }
  | { kind: "code_changes"; changes: FileChange[]; summary: string }
  | { kind: "conversation"; message: string }
  | { kind: "error"; message: string; reason?: string };

export type ResponseKind = ParsedResponse["kind"];

export type RequestType = "generation" | "modification" | "conversation" | "error";

export interface ChatResponse {
  type: ResponseKind;
  payload: ParsedResponse;
  sessionId: string;
  isCodeChange: boolean;
  requestType: RequestType;
  workspaceTree?: WorkspaceTree;
  usage?: TokenUsage;
  modelName?: string;
  modelId?: string;
  provider?: ProviderId;
}

const REQUEST_TYPES: Record<ResponseKind, RequestType> = {
  code_generation: "generation",
  code_changes: "modification",
  conversation: "conversation",
  error: "error",
};

export function requestTypeFor(kind: ResponseKind): RequestType {
  return REQUEST_TYPES[kind];
}

export function isCodeKind(kind: ResponseKind): boolean {
  return kind === "code_generation" || kind === "code_changes";
}
