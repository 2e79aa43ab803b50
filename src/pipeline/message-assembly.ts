/**
 * Builds the single user message stored for a turn: an optional context block, then the query.
 */

import type { ChatContext } from "./types";

export function hasStructuredContext(context: ChatContext | undefined): boolean {
  if (!context) return false;
  return (context.openFiles?.length ?? 0) > 0 || context.workspaceTree !== undefined;
}

/** XML-tagged open files and workspace structure; empty string when there is nothing to attach. */
export function buildContextString(context: ChatContext | undefined): string {
  if (!context) return "";
  const parts: string[] = [];

  if (context.openFiles && context.openFiles.length > 0) {
    parts.push("<open_files>");
    for (const file of context.openFiles) {
      parts.push(`<file path='${file.path}'>`);
      parts.push(file.content);
      parts.push("</file>");
    }
    parts.push("</open_files>");
  }

  if (context.workspaceTree) {
    parts.push("<workspace_structure>");
    parts.push(`<root>${context.workspaceTree.root}</root>`);
    parts.push(JSON.stringify(context.workspaceTree, null, 2));
    parts.push("</workspace_structure>");
  }

  return parts.join("\n");
}

export interface AssembleArgs {
  query: string;
  context?: ChatContext;
  isModification: boolean;
  /** Session's last generated code, if any. */
  previousCode?: string;
}

/** Attaches the workspace context, else previous code for a modification, never both. */
export function assembleUserMessage(args: AssembleArgs): string {
  const parts: string[] = [];
  const contextString = buildContextString(args.context);

  if (contextString) {
    parts.push(`<workspace_context>\n${contextString}\n</workspace_context>\n`);
  } else if (args.isModification && args.previousCode !== undefined) {
    parts.push(`<previous_code>\n${args.previousCode}\n</previous_code>\n`);
  }

  parts.push(`<user_request>\n${args.query}\n</user_request>`);
  return parts.join("\n");
}
