import assert from "node:assert";

import type { Element } from "hast";

import { parseFragment, pruneEmptyElements, serializeFragment, tidyWhitespace, withDocumentHeader } from "../src/fragment";
import {
  confineToTags,
  demoteHeadings,
  isPresentationalSpan,
  normalizeFragment,
  removeScriptElements,
  stripPresentationalSpans,
  synthesizeHeadings,
  unwrapBoldHeadings,
} from "../src/normalize";

function parse(html: string) {
  return parseFragment(withDocumentHeader(html));
}

function span(properties: Element["properties"], tagName = "span"): Element {
  return { type: "element", tagName, properties, children: [] };
}

function testDemoteHeadings(): void {
  const original = parse("<section><h1>Deep</h1></section>");
  assert.strictEqual(serializeFragment(demoteHeadings(original)), "<section><h2>Deep</h2></section>\n");
  assert.strictEqual(serializeFragment(original), "<section><h1>Deep</h1></section>\n", "input tree must stay untouched");
}

function testSynthesizeHeadings(): void {
  const fragment = parse("<p><b>Short</b></p><p><b>Longer</b></p>");
  assert.strictEqual(serializeFragment(synthesizeHeadings(fragment, { headingMaxLength: 5 })), "<h2>Short</h2>\n<p><b>Longer</b></p>\n");

  assert.strictEqual(serializeFragment(synthesizeHeadings(parse("<p> <strong>Title</strong> </p>"))), "<h2>Title</h2>\n");
  assert.strictEqual(serializeFragment(synthesizeHeadings(parse("<p><strong> </strong></p>"))), "<p><strong> </strong></p>\n");
  assert.strictEqual(
    serializeFragment(synthesizeHeadings(parse("<div><p><strong>Nested</strong></p></div>"))),
    "<div><p><strong>Nested</strong></p></div>\n",
  );
}

function testUnwrapBoldHeadings(): void {
  assert.strictEqual(serializeFragment(unwrapBoldHeadings(parse("<h2><strong>Already</strong></h2>"))), "<h2>Already</h2>\n");
  assert.strictEqual(serializeFragment(unwrapBoldHeadings(parse("<h2><b>A</b> and more</h2>"))), "<h2><b>A</b> and more</h2>\n");
}

function testPresentationalSpans(): void {
  assert.strictEqual(isPresentationalSpan(span({ className: ["x"], lang: "en" })), true);
  assert.strictEqual(isPresentationalSpan(span({})), true);
  assert.strictEqual(isPresentationalSpan(span({ id: "a" })), false);
  assert.strictEqual(isPresentationalSpan(span({}, "div")), false);

  const fragment = parse('<p><span style="color:red">a</span><span id="k">b</span></p>');
  assert.strictEqual(serializeFragment(stripPresentationalSpans(fragment)), '<p>a<span id="k">b</span></p>\n');
}

function testListItemParagraphs(): void {
  const fragment = parse("<ul><li><p>x</p></li></ul>");
  assert.strictEqual(serializeFragment(normalizeFragment(fragment, { firstPass: true })), "<ul><li>x</li></ul>\n");
  assert.strictEqual(serializeFragment(normalizeFragment(fragment, { firstPass: false })), "<ul><li><p>x</p></li></ul>\n");
}

function testStructuralHelpers(): void {
  const table = parse("<table><tr><td>x</td></tr></table>");
  assert.strictEqual(serializeFragment(table), "<table><tbody><tr><td>x</td></tr></tbody></table>\n");
  assert.strictEqual(serializeFragment(confineToTags(table, ["table", "tr", "td"])), "<table><tr><td>x</td></tr></table>\n");

  assert.strictEqual(serializeFragment(removeScriptElements(parse("<p>a</p><script>x()</script>"))), "<p>a</p>\n");
}

function testImpliedParagraphs(): void {
  const loose = parseFragment(withDocumentHeader("Loose <b>text</b><p>Para</p> tail "), { impliedParagraphs: true });
  assert.strictEqual(serializeFragment(loose), "<p>Loose <b>text</b></p>\n<p>Para</p>\n<p>tail</p>\n");

  const spaced = parseFragment(withDocumentHeader("<p>a</p>\n<p>b</p>"), { impliedParagraphs: true });
  assert.strictEqual(serializeFragment(spaced), "<p>a</p>\n<p>b</p>\n");
}

function testEmptyElementPruning(): void {
  const fragment = parse("<p><b> </b></p><p>x<span>\u00a0</span></p><table><tr><td></td></tr></table>");
  assert.strictEqual(serializeFragment(pruneEmptyElements(fragment)), "<p>x</p>\n<table><tbody><tr><td></td></tr></tbody></table>\n");
}

function testWhitespaceTidy(): void {
  const fragment = parse('<p> a  b</p> <div class="k"> c</div>');
  assert.strictEqual(serializeFragment(tidyWhitespace(fragment)), '<p>a b</p>\n<div class="k"> c</div>\n');
}

testDemoteHeadings();
testSynthesizeHeadings();
testUnwrapBoldHeadings();
testPresentationalSpans();
testListItemParagraphs();
testStructuralHelpers();
testImpliedParagraphs();
testEmptyElementPruning();
testWhitespaceTidy();
console.log("normalize tests passed");
