import { isSourcePath, isTestPath } from "../extractor/files";
import type { CommitNode } from "../types";

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@ ?(.*)$/gm;
const CALLABLE = /([A-Za-z_$][\w$]*)\s*(?:<[^()]*>)?\s*\(/g;
const TYPE_DECL = /\b(?:class|struct|interface|trait|impl|module|enum|object)\s+([A-Za-z_$][\w$]*)/;

const NOT_A_NAME = new Set([
  "if", "for", "while", "switch", "catch", "return", "func", "function", "def", "fn", "sizeof",
  "synchronized", "foreach", "elif", "else", "new", "throw", "await", "typeof", "with",
]);

/** Name of the function or type a hunk header's context line points into. */
export function functionFromContext(context: string): string | undefined {
  const line = context.trim();
  if (!line) return undefined;
  for (const m of line.matchAll(CALLABLE)) {
    if (!NOT_A_NAME.has(m[1])) return m[1];
  }
  return TYPE_DECL.exec(line)?.[1];
}

/**
 * Functions a commit touches, recovered from the context of its diff hunk
 * headers. Test and non-source files are ignored.
 */
export function changedFunctions(commit: CommitNode): string[] {
  const out = new Set<string>();
  for (const f of commit.files) {
    if (!f.patch || !isSourcePath(f.path) || isTestPath(f.path)) continue;
    for (const m of f.patch.matchAll(HUNK_HEADER)) {
      const name = functionFromContext(m[1]);
      if (name) out.add(name);
    }
  }
  return [...out].sort();
}
