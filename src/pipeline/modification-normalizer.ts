/**
 * Orders line edits so they can be applied one after another to the original file.
 *
 * Every edit is numbered against the original text. Applied bottom-up, an edit never shifts the
 * lines that a not-yet-applied edit (lower startLine) refers to.
 */

import type { FileChange, Modification } from "./types";

/**
 * Group by file (first-occurrence order) and sort each file's edits by startLine, descending.
 * Equal startLines keep their input order; what overlapping edits mean is up to the caller.
 */
export function sortModifications(changes: FileChange[]): FileChange[] {
  const byFile = new Map<string, Modification[]>();
  for (const change of changes) {
    const mods = byFile.get(change.file) ?? [];
    mods.push(...change.modifications);
    byFile.set(change.file, mods);
  }

  const sorted: FileChange[] = [];
  for (const [file, mods] of byFile) {
    // Array.prototype.sort is stable
    sorted.push({ file, modifications: [...mods].sort((a, b) => b.startLine - a.startLine) });
  }
  return sorted;
}
