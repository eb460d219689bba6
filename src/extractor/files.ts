const SOURCE_EXTENSIONS = [
  "c", "h", "cc", "cpp", "cxx", "hpp", "hh", "go", "rs", "java", "kt", "kts", "scala", "groovy",
  "py", "rb", "js", "mjs", "cjs", "jsx", "ts", "tsx", "php", "cs", "swift", "m", "mm", "pl", "pm",
  "lua", "sh", "ex", "exs", "erl", "clj", "dart", "vue", "svelte",
];

const DOC_EXTENSIONS = new Set(["md", "markdown", "rst", "txt", "adoc", "asciidoc", "html", "htm"]);
const DOC_NAMES = /^(?:readme|changelog|changes|history|news|license|licence|notice|authors|contributors|copying|security)(?:\.|$)/i;
const DOC_DIRS = /(?:^|\/)(?:docs?|documentation|site|website)\//i;

const TEST_DIRS = /(?:^|\/)(?:tests?|__tests__|spec|specs|testing|testdata|fixtures?|src\/test|benchmarks?)\//i;
const TEST_FILES = /(?:^|\/)(?:test_[^/]+|[^/]+_test\.\w+|[^/]+Tests?\.\w+|[^/]+\.(?:test|spec)\.\w+|conftest\.py)$/;

/** Alternation of source-file extensions, for embedding in a RegExp. */
export const SOURCE_EXTENSION_PATTERN = SOURCE_EXTENSIONS.join("|");

function extension(path: string): string {
  const base = path.slice(path.lastIndexOf("/") + 1);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : "";
}

export function basename(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}

export function isDocumentationPath(path: string): boolean {
  return DOC_EXTENSIONS.has(extension(path)) || DOC_NAMES.test(basename(path)) || DOC_DIRS.test(path);
}

export function isTestPath(path: string): boolean {
  return TEST_DIRS.test(path) || TEST_FILES.test(path);
}

export function isSourcePath(path: string): boolean {
  return SOURCE_EXTENSIONS.includes(extension(path));
}
