import { test } from "node:test";
import assert from "node:assert/strict";

import { DanglingPlaceholderError, UnresolvedZoneError } from "../../errors";
import { formatPlaceholderToken, PlaceholderStore } from "../placeholderStore";

const BODY =
  '<p>Energy <span class="MathJax">E=mc^2</span> and <code>x=1</code>.</p><pre>a\n\nb</pre><!-- note -->';

test("substituteAll replaces protected zones in document order", () => {
  const store = new PlaceholderStore();
  const placeholdered = store.substituteAll(BODY);

  assert.equal(
    placeholdered,
    "<p>Energy MATH_PLACEHOLDER_000 and CODE_PLACEHOLDER_001.</p>CODE_PLACEHOLDER_002COMMENT_PLACEHOLDER_003",
  );
  assert.deepEqual(
    store.list().map(({ token, kind, originalContent }) => ({ token, kind, originalContent })),
    [
      { token: "MATH_PLACEHOLDER_000", kind: "math", originalContent: '<span class="MathJax">E=mc^2</span>' },
      { token: "CODE_PLACEHOLDER_001", kind: "code", originalContent: "<code>x=1</code>" },
      { token: "CODE_PLACEHOLDER_002", kind: "code", originalContent: "<pre>a\n\nb</pre>" },
      { token: "COMMENT_PLACEHOLDER_003", kind: "comment", originalContent: "<!-- note -->" },
    ],
  );
});

test("restore is the inverse of substituteAll", () => {
  const store = new PlaceholderStore();
  assert.equal(store.restore(store.substituteAll(BODY)), BODY);
});

test("substituteAll is idempotent on placeholdered text", () => {
  const store = new PlaceholderStore();
  const once = store.substituteAll(BODY);
  assert.equal(store.substituteAll(once), once);
  assert.equal(store.size, 4);
});

test("nested protected elements become a single zone", () => {
  const store = new PlaceholderStore();
  assert.equal(store.substituteAll("<pre><code>let a = 1;</code></pre>"), "CODE_PLACEHOLDER_000");
  assert.equal(store.get("CODE_PLACEHOLDER_000")?.originalContent, "<pre><code>let a = 1;</code></pre>");
});

test("math scripts, plain scripts and embedded graphics are protected by kind", () => {
  const store = new PlaceholderStore();
  const result = store.substituteAll(
    '<script type="math/tex; mode=display">x^2</script><script>var a = "<p>";</script><svg><text>Label</text></svg><style>p { color: red; }</style>',
  );
  assert.equal(
    result,
    "MATH_PLACEHOLDER_000SCRIPT_PLACEHOLDER_001RAW_HTML_PLACEHOLDER_002STYLE_PLACEHOLDER_003",
  );
});

test("tokens are zero padded to three digits and grow past them", () => {
  const store = new PlaceholderStore();
  assert.equal(store.extract("code", "<code>a</code>").token, "CODE_PLACEHOLDER_000");
  assert.equal(store.extract("math", "<math></math>").token, "MATH_PLACEHOLDER_001");
  assert.equal(formatPlaceholderToken("raw_html", 1234), "RAW_HTML_PLACEHOLDER_1234");
  assert.equal(formatPlaceholderToken("code", 7, 4), "CODE_PLACEHOLDER_0007");
});

test("findTokens finds tokens glued to surrounding text", () => {
  const store = new PlaceholderStore();
  store.extract("code", "<code>a</code>");
  store.extract("math", "<math></math>");

  assert.deepEqual(store.findTokens("xCODE_PLACEHOLDER_000s yMATH_PLACEHOLDER_0012"), [
    "CODE_PLACEHOLDER_000",
    "MATH_PLACEHOLDER_001",
  ]);
  assert.deepEqual(store.findTokens("see CODE_PLACEHOLDER_042 here"), ["CODE_PLACEHOLDER_042"]);
});

test("restore round-trips zones with letters and digits on both sides", () => {
  const body =
    '<p>Two <code>Tensor</code>s and the <span class="MathJax">i</span>th row, x<code>2</code>3</p>';
  const store = new PlaceholderStore();
  const placeholdered = store.substituteAll(body);

  assert.equal(
    placeholdered,
    "<p>Two CODE_PLACEHOLDER_000s and the MATH_PLACEHOLDER_001th row, xCODE_PLACEHOLDER_0023</p>",
  );
  assert.equal(store.restore(placeholdered), body);
});

test("one substitution pass gives every token the same width", () => {
  const body = Array.from({ length: 1001 }, () => "<code>c</code>").join("0");
  const store = new PlaceholderStore();
  const placeholdered = store.substituteAll(body);

  assert.equal(store.get("CODE_PLACEHOLDER_0000")?.originalContent, "<code>c</code>");
  assert.equal(store.get("CODE_PLACEHOLDER_1000")?.placeholderId, 1000);
  assert.ok(placeholdered.startsWith("CODE_PLACEHOLDER_00000CODE_PLACEHOLDER_0001"));
  assert.equal(store.restore(placeholdered), body);
});

test("extracted zones are immutable", () => {
  const zone = new PlaceholderStore().extract("code", "<code>a</code>", 7);
  assert.ok(Object.isFrozen(zone));
  assert.equal(zone.position, 7);
});

test("restore rejects unknown and duplicated tokens", () => {
  const store = new PlaceholderStore();
  store.extract("code", "<code>a</code>");

  assert.throws(() => store.restore("CODE_PLACEHOLDER_000 CODE_PLACEHOLDER_999"), DanglingPlaceholderError);
  assert.throws(
    () => store.restore("CODE_PLACEHOLDER_000 and CODE_PLACEHOLDER_000"),
    (error: unknown) => error instanceof DanglingPlaceholderError && error.token === "CODE_PLACEHOLDER_000",
  );
});

test("restore reports every missing zone", () => {
  const store = new PlaceholderStore();
  store.extract("code", "<code>a</code>");
  store.extract("math", "<math></math>");
  store.extract("comment", "<!-- c -->");

  assert.throws(
    () => store.restore("only MATH_PLACEHOLDER_001"),
    (error: unknown) =>
      error instanceof UnresolvedZoneError &&
      error.tokens.join(",") === "CODE_PLACEHOLDER_000,COMMENT_PLACEHOLDER_002",
  );
});

test("restore inserts markup literally", () => {
  const store = new PlaceholderStore();
  store.extract("code", "<code>$&amp; $1</code>");
  assert.equal(store.restore("x CODE_PLACEHOLDER_000"), "x <code>$&amp; $1</code>");
});
