import { filePathFromUrl } from "../collectors/advisory/references";
import type { ChangedFile, VulnerabilityRecord } from "../types";
import { SOURCE_EXTENSION_PATTERN, basename } from "./files";

const FILE_MENTION = new RegExp(`(?:^|[\\s(\`'"])((?:[\\w.-]+/)*[\\w.-]+\\.(?:${SOURCE_EXTENSION_PATTERN}))(?=$|[\\s)\`'",:;]|\\.(?:\\s|$))`, "g");

function clean(p: string): string {
  return p.replace(/^\.?\/+/, "");
}

/**
 * File paths the advisory points at: source files named in the description
 * and the paths of blob/tree reference links.
 */
export function pathHints(record: Pick<VulnerabilityRecord, "description" | "references">): string[] {
  const hints = new Set<string>();
  for (const m of record.description.matchAll(FILE_MENTION)) hints.add(clean(m[1]));
  for (const r of record.references) {
    const p = filePathFromUrl(r.url);
    if (p) hints.add(clean(p));
  }
  return [...hints].sort();
}

/** Whether a hint denotes this path: same path, a path suffix, or the same file name. */
export function matchesHint(path: string, hint: string): boolean {
  if (path === hint || path.endsWith(`/${hint}`) || hint.endsWith(`/${path}`)) return true;
  return !hint.includes("/") && basename(path) === hint;
}

export function touchesHintedPath(files: readonly ChangedFile[], hints: readonly string[]): boolean {
  return files.some((f) => hints.some((h) => matchesHint(f.path, h) || (f.previousPath !== undefined && matchesHint(f.previousPath, h))));
}
