import { test } from "node:test";
import assert from "node:assert/strict";
import { isTag } from "domhandler";

import { MalformedDocumentError } from "../../services/errors";
import {
  applyEdits,
  assertWellFormed,
  describeElement,
  escapeHtmlAttribute,
  findOpenTagEnd,
  parseHtml,
  rootNodes,
  setTagAttribute,
} from "../htmlSource";

const checkFragment = (source: string) => {
  const parsed = parseHtml(source);
  assertWellFormed(source, rootNodes(parsed), { start: 0, end: source.length });
};

test("findOpenTagEnd skips > inside quoted attribute values", () => {
  assert.equal(findOpenTagEnd('<a title="x>y" href=z>t</a>', 0), 21);
  assert.equal(findOpenTagEnd("<p", 0), -1);
});

test("describeElement reports start tag and content ranges", () => {
  const source = '<p class="lead">Hello</p>';
  const [node] = rootNodes(parseHtml(source));
  assert.ok(node && isTag(node));

  const layout = describeElement(source, node);
  assert.deepEqual(layout.outer, { start: 0, end: source.length });
  assert.equal(source.slice(layout.openTag.start, layout.openTag.end), '<p class="lead">');
  assert.ok(layout.content);
  assert.equal(source.slice(layout.content.start, layout.content.end), "Hello");
});

test("assertWellFormed accepts void and self-closed elements", () => {
  assert.doesNotThrow(() =>
    checkFragment('<div><p>x<br>y</p><img src="a.png"/><hr></div>'),
  );
});

test("assertWellFormed rejects unclosed elements and stray end tags", () => {
  assert.throws(() => checkFragment("<p>a</p><p>b"), MalformedDocumentError);
  assert.throws(() => checkFragment("<p>a</span></p>"), MalformedDocumentError);
  assert.throws(() => checkFragment("<div><p>a</div>"), MalformedDocumentError);
});

test("applyEdits applies edits by offset and refuses overlaps", () => {
  assert.equal(
    applyEdits("abcdef", [
      { start: 1, end: 2, text: "X" },
      { start: 4, end: 6, text: "" },
    ]),
    "aXcd",
  );
  assert.throws(() =>
    applyEdits("abcdef", [
      { start: 1, end: 4, text: "X" },
      { start: 3, end: 5, text: "Y" },
    ]),
  );
});

test("setTagAttribute replaces, fills or appends an attribute", () => {
  assert.equal(setTagAttribute('<html lang="en">', "lang", "zh-CN"), '<html lang="zh-CN">');
  assert.equal(
    setTagAttribute('<html class="no-js">', "lang", "zh-CN"),
    '<html class="no-js" lang="zh-CN">',
  );
  assert.equal(setTagAttribute("<html lang>", "lang", "zh-CN"), '<html lang="zh-CN">');
  assert.equal(
    setTagAttribute('<meta name="description" content="A &amp; B">', "content", "甲 & 乙"),
    '<meta name="description" content="甲 &amp; 乙">',
  );
  assert.equal(setTagAttribute("<img src=a.png/>", "alt", "x"), '<img src=a.png alt="x" />');
});

test("escapeHtmlAttribute escapes quotes and markup", () => {
  assert.equal(escapeHtmlAttribute('"a" <b> & c'), "&quot;a&quot; &lt;b&gt; &amp; c");
});
