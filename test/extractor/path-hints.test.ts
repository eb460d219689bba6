import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { isDocumentationPath, isSourcePath, isTestPath } from "../../src/extractor/files";
import { matchesHint, pathHints, touchesHintedPath } from "../../src/extractor/path-hints";

describe("pathHints", () => {
  it("collects source files named in the description and blob links", () => {
    const hints = pathHints({
      description:
        "The flaw is in src/main/java/org/xerial/snappy/SnappyInputStream.java and in `util.c`. " +
        "SnappyInputStream.hasNextChunk trusts the header; see ./tools/gen.py.",
      references: [
        { url: "https://github.com/o/r/blob/main/lib/parser.c#L10", kind: "other", source: "osv" },
        { url: "https://github.com/o/r/issues/4", kind: "issue", source: "osv" },
      ],
    });
    assert.deepEqual(hints, [
      "lib/parser.c",
      "src/main/java/org/xerial/snappy/SnappyInputStream.java",
      "tools/gen.py",
      "util.c",
    ]);
  });

  it("ignores names without a source extension", () => {
    assert.deepEqual(pathHints({ description: "See docs/guide.md and config.yaml for details.", references: [] }), []);
  });
});

describe("matchesHint", () => {
  it("matches equal paths, path suffixes and bare file names", () => {
    assert.equal(matchesHint("src/a/util.c", "util.c"), true);
    assert.equal(matchesHint("lib/x.c", "src/lib/x.c"), true);
    assert.equal(matchesHint("src/lib/x.c", "lib/x.c"), true);
    assert.equal(matchesHint("src/b.c", "a/b.c"), false);
    assert.equal(matchesHint("src/xutil.c", "util.c"), false);
  });

  it("follows renames through the previous path", () => {
    const files = [{ path: "src/new.c", previousPath: "src/old.c", status: "renamed" as const, additions: 0, deletions: 0 }];
    assert.equal(touchesHintedPath(files, ["old.c"]), true);
    assert.equal(touchesHintedPath(files, ["other.c"]), false);
  });
});

describe("path classification", () => {
  it("separates source, test and documentation files", () => {
    assert.equal(isSourcePath("src/main/java/Foo.java"), true);
    assert.equal(isSourcePath("build.sbt"), false);
    assert.equal(isTestPath("src/test/java/FooTest.java"), true);
    assert.equal(isTestPath("pkg/parser_test.go"), true);
    assert.equal(isTestPath("lib/contest.rb"), false);
    assert.equal(isDocumentationPath("README"), true);
    assert.equal(isDocumentationPath("docs/api/index.rst"), true);
    assert.equal(isDocumentationPath("src/readme_parser.c"), false);
  });
});
