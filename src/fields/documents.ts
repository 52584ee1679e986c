/**
 * Field discovery over returned documents.
 */

import type { SearchDocument } from "./types";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function walk(value: Record<string, unknown>, prefix: string, out: Set<string>): void {
  for (const [key, child] of Object.entries(value)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(child)) {
      walk(child, path, out);
    } else {
      // Scalars, nulls and arrays are leaves.
      out.add(path);
    }
  }
}

/**
 * Dotted paths of every leaf in a document, sorted.
 * `{ user: { name: "a" }, tags: ["x"] }` → `["tags", "user.name"]`.
 */
export function collectFieldPaths(doc: SearchDocument): string[] {
  const out = new Set<string>();
  walk(doc, "", out);
  return [...out].sort();
}

export function collectFieldSet(docs: readonly SearchDocument[]): Set<string> {
  const out = new Set<string>();
  for (const doc of docs) {
    for (const path of collectFieldPaths(doc)) out.add(path);
  }
  return out;
}
