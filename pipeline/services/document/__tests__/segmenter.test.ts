import { test } from "node:test";
import assert from "node:assert/strict";

import { MalformedDocumentError } from "../../errors";
import { segment } from "../segmenter";

const PAGE = `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>Rooflines &amp; Bandwidth</title>
<meta name="description" content="How to think about   compute">
</head>
<body>
<h1>Rooflines</h1>
<p>Arithmetic intensity <span class="katex">I = F/B</span> matters.</p>
</body>
</html>`;

test("segment reads head metadata and placeholders the body", () => {
  const document = segment(PAGE);

  assert.deepEqual(document.metadata, {
    title: "Rooflines & Bandwidth",
    description: "How to think about compute",
  });
  assert.equal(
    document.body,
    '\n<h1>Rooflines</h1>\n<p>Arithmetic intensity <span class="katex">I = F/B</span> matters.</p>\n',
  );
  assert.equal(
    document.placeholderedBody,
    "\n<h1>Rooflines</h1>\n<p>Arithmetic intensity MATH_PLACEHOLDER_000 matters.</p>\n",
  );
  assert.deepEqual(document.layout.blocks, [
    "Rooflines",
    "Arithmetic intensity MATH_PLACEHOLDER_000 matters.",
  ]);
  assert.equal(document.store.size, 1);

  const { title, description, htmlOpenTag } = document.headSlots;
  assert.ok(title && description && htmlOpenTag);
  assert.equal(PAGE.slice(title.start, title.end), "Rooflines &amp; Bandwidth");
  assert.equal(
    PAGE.slice(description.start, description.end),
    '<meta name="description" content="How to think about   compute">',
  );
  assert.equal(PAGE.slice(htmlOpenTag.start, htmlOpenTag.end), "<html>");
  assert.equal(PAGE.slice(document.bodyRange.start, document.bodyRange.end), document.body);
});

test("input without a document shell is segmented as a body fragment", () => {
  const document = segment("<p>Hello <code>x=1</code> world</p>");

  assert.deepEqual(document.metadata, { title: null, description: null });
  assert.equal(document.headSlots.htmlOpenTag, null);
  assert.equal(document.placeholderedBody, "<p>Hello CODE_PLACEHOLDER_000 world</p>");
  assert.deepEqual(document.layout.blocks, ["Hello CODE_PLACEHOLDER_000 world"]);
});

test("protected zones are not checked for well-formedness", () => {
  const document = segment("<html><body><pre><b>bold</pre></body></html>");
  assert.equal(document.placeholderedBody, "CODE_PLACEHOLDER_000");
  assert.equal(document.store.get("CODE_PLACEHOLDER_000")?.originalContent, "<pre><b>bold</pre>");
});

test("segment rejects malformed documents", () => {
  assert.throws(() => segment("   \n"), MalformedDocumentError);
  assert.throws(() => segment("<html><head><title>x</title></head></html>"), MalformedDocumentError);
  assert.throws(() => segment("<html><body><p>open</body></html>"), MalformedDocumentError);
  assert.throws(() => segment("<html><body><p>a</p></div></body></html>"), MalformedDocumentError);
});
