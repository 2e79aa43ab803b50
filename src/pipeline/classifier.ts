/**
 * Request classification. Plain substring checks on the lowercased query.
 * Results are advisory: they pick which context block goes with the message, and how an unparseable
 * reply is reported. The model's own `type` field decides the response kind.
 */

const CODE_KEYWORDS = [
  "create",
  "generate",
  "build",
  "make",
  "add",
  "modify",
  "change",
  "update",
  "fix",
  "remove",
  "delete",
  "refactor",
  "component",
  "hook",
  "function",
  "app",
  "page",
  "form",
];

const MODIFICATION_KEYWORDS = [
  "change",
  "modify",
  "update",
  "fix",
  "add",
  "remove",
  "delete",
  "edit",
  "refactor",
  "improve",
  "adjust",
  "alter",
  "correct",
  "replace",
  "swap",
  "rename",
  "move",
  "convert",
];

const REFERENCE_PHRASES = [
  "the code",
  "above",
  "previous",
  "existing",
  "current",
  "this code",
  "that function",
  "the function",
  "this component",
];

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((n) => haystack.includes(n));
}

/** True when the query reads like a request for code rather than small talk. */
export function isLikelyCodeRequest(query: string): boolean {
  return containsAny(query.toLowerCase(), CODE_KEYWORDS);
}

/** True when the query asks to change something AND there is something to change. */
export function isModificationRequest(query: string, hasContext: boolean, hasPreviousCode: boolean): boolean {
  const q = query.toLowerCase();
  const asksForChange = containsAny(q, MODIFICATION_KEYWORDS) || containsAny(q, REFERENCE_PHRASES);
  return asksForChange && (hasContext || hasPreviousCode);
}
