import type { CommitNode } from "../types";
import stopwordList from "./data/stopwords.json";

const STOPWORDS = new Set<string>(stopwordList);
const MIN_TERM_LENGTH = 3;

/** Fold simple English plurals so "allocations" meets "allocation". */
export function normalizeTerm(word: string): string {
  const w = word.toLowerCase();
  if (w.length > 4 && w.endsWith("ies")) return `${w.slice(0, -3)}y`;
  if (w.length > 4 && w.endsWith("s") && !w.endsWith("ss") && !w.endsWith("us")) return w.slice(0, -1);
  return w;
}

function splitIdentifier(word: string): string[] {
  return word
    .split(/_+/)
    .flatMap((part) => part.split(/(?<=[a-z0-9])(?=[A-Z])|(?<=[A-Z])(?=[A-Z][a-z])/))
    .filter(Boolean);
}

/**
 * Distinct content terms of a text. Identifiers count both whole and by
 * their camelCase/snake_case parts.
 */
export function terms(text: string): Set<string> {
  const out = new Set<string>();
  const add = (w: string) => {
    const t = normalizeTerm(w);
    if (t.length < MIN_TERM_LENGTH || /^\d+$/.test(t) || STOPWORDS.has(t) || STOPWORDS.has(w.toLowerCase())) return;
    out.add(t);
  };
  for (const word of text.match(/[A-Za-z][A-Za-z0-9_]*/g) ?? []) {
    add(word);
    const parts = splitIdentifier(word);
    if (parts.length > 1) parts.forEach(add);
  }
  return out;
}

/** Changed lines of a unified diff, without the +/- markers and file headers. */
export function changedLines(patch: string): string[] {
  const lines: string[] = [];
  for (const line of patch.split("\n")) {
    if (line.startsWith("+++") || line.startsWith("---")) continue;
    if (line.startsWith("+") || line.startsWith("-")) lines.push(line.slice(1));
  }
  return lines;
}

/**
 * The text a commit is judged by: message, changed paths and changed diff
 * lines, cut at `maxChars`.
 */
export function commitText(commit: CommitNode, maxChars: number): string {
  const parts = [commit.message, ...commit.files.map((f) => f.path)];
  for (const f of commit.files) {
    if (f.patch) parts.push(...changedLines(f.patch));
  }
  return parts.join("\n").slice(0, maxChars);
}

/** Whether a keyword occurs: plain words by term, anything else (`__proto__`, `..`) by substring. */
export function containsKeyword(keyword: string, textTerms: ReadonlySet<string>, lowerText: string): boolean {
  const k = keyword.toLowerCase();
  if (/^[a-z0-9]+$/.test(k)) return textTerms.has(normalizeTerm(k));
  return lowerText.includes(k);
}
