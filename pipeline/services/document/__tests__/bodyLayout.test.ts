import { test } from "node:test";
import assert from "node:assert/strict";

import { fillLayout, layoutBody } from "../bodyLayout";

test("layoutBody separates markup from translatable blocks", () => {
  const body =
    "\n<h1>Title</h1>\n<p>Hello <em>world</em></p>\nCODE_PLACEHOLDER_000\n<ul><li>One</li><li>Two</li></ul>\n";
  const layout = layoutBody(body);

  assert.deepEqual(layout.blocks, ["Title", "Hello <em>world</em>", "One", "Two"]);
  assert.deepEqual(layout.parts, [
    { kind: "markup", html: "\n<h1>" },
    { kind: "block", blockIndex: 0 },
    { kind: "markup", html: "</h1>\n<p>" },
    { kind: "block", blockIndex: 1 },
    { kind: "markup", html: "</p>\nCODE_PLACEHOLDER_000\n<ul><li>" },
    { kind: "block", blockIndex: 2 },
    { kind: "markup", html: "</li><li>" },
    { kind: "block", blockIndex: 3 },
    { kind: "markup", html: "</li></ul>\n" },
  ]);
  assert.equal(fillLayout(layout, layout.blocks), body);
});

test("inline runs around nested blocks become their own blocks", () => {
  const layout = layoutBody("<div>Intro text<p>Para</p>tail</div>");
  assert.deepEqual(layout.blocks, ["Intro text", "Para", "tail"]);
  assert.equal(fillLayout(layout, ["引言", "段落", "结尾"]), "<div>引言<p>段落</p>结尾</div>");
});

test("whitespace at block edges stays in the markup", () => {
  const layout = layoutBody("<p>\n  Padded text  \n</p>");
  assert.deepEqual(layout.blocks, ["Padded text"]);
  assert.equal(fillLayout(layout, ["填充"]), "<p>\n  填充  \n</p>");
});

test("blank lines inside a block are collapsed", () => {
  assert.deepEqual(layoutBody("<p>line one\n\n  line two</p>").blocks, ["line one\nline two"]);
});

test("runs without letters are not translated", () => {
  const layout = layoutBody("<table><tr><td>42</td><td>&nbsp;</td><td>MATH_PLACEHOLDER_000</td></tr></table>");
  assert.deepEqual(layout.blocks, []);
  assert.deepEqual(layout.parts, [
    { kind: "markup", html: "<table><tr><td>42</td><td>&nbsp;</td><td>MATH_PLACEHOLDER_000</td></tr></table>" },
  ]);
});

test("fillLayout requires a translation for every block", () => {
  const layout = layoutBody("<p>One</p><p>Two</p>");
  assert.throws(() => fillLayout(layout, ["一"]), RangeError);
});
