import assert from "node:assert";

import { clean } from "../src/clean";

function testHeadings(): void {
  assert.strictEqual(clean("<p><strong>Section Title</strong></p>"), "<h2>Section Title</h2>");
  assert.strictEqual(clean("<h1>Main Title</h1><p>Intro text</p>"), "<h2>Main Title</h2>\n<p>Intro text</p>");
  assert.strictEqual(clean("<h2><strong>Already</strong></h2>"), "<h2>Already</h2>");

  const long = "<p><strong>This bold sentence is clearly far longer than fifty characters overall</strong></p>";
  assert.strictEqual(clean(long), long);
  assert.strictEqual(clean("<p><strong>Tiny</strong></p>", {}, { headingMaxLength: 3 }), "<p><strong>Tiny</strong></p>");
}

function testEditorArtifacts(): void {
  assert.strictEqual(clean('<ul><li><p><span style="font-weight:400">Item one</span></p></li></ul>'), "<ul><li>Item one</li></ul>");
  assert.strictEqual(clean('<p>Safe</p><script>alert("x")</script>'), "<p>Safe</p>");
  assert.strictEqual(clean("First line<br /><br />Second line"), "<p>First line</p>\n<p>Second line</p>");
  assert.strictEqual(clean("Just some text"), "<p>Just some text</p>");
}

function testEntities(): void {
  assert.strictEqual(clean("<p>Hello&nbsp;world</p>"), "<p>Hello world</p>");
  assert.strictEqual(clean("<p>&nbsp;</p><p>Text</p>"), "<p>Text</p>");
  assert.strictEqual(clean("<p>Tom &amp; Jerry</p>"), "<p>Tom &amp; Jerry</p>");
}

function testOptionalTags(): void {
  const link = '<p>Visit <a href="https://example.com" target="_blank" onclick="x()">site</a></p>';
  assert.strictEqual(clean(link, { links: true }), '<p>Visit <a href="https://example.com" target="_blank">site</a></p>');
  assert.strictEqual(clean(link), "<p>Visit site</p>");

  const image = '<p><img src="https://example.com/a.png" alt="A" width="10"></p>';
  assert.strictEqual(clean(image, { images: true }), '<p><img src="https://example.com/a.png" alt="A" /></p>');
  assert.strictEqual(clean(image), "");

  const italics = "<p><em>Stress</em> and <i>idiom</i></p>";
  assert.strictEqual(clean(italics, { italics: true }), italics);
  assert.strictEqual(clean(italics), "<p>Stress and idiom</p>");

  const table = "<table><tr><td>Cell</td></tr></table>";
  assert.strictEqual(clean(table, { table: true }), table);
  assert.strictEqual(clean(table), "<p>Cell</p>");
}

function testStrip(): void {
  assert.strictEqual(clean("<h1>Title</h1><p>Body <strong>bold</strong></p>", { strip: true, links: true }), "Title\nBody bold");
}

function testIdempotence(): void {
  const input = "<h2>Title</h2>\n<p>Some <strong>bold</strong> text.</p>\n<ul>\n<li>One</li>\n<li>Two</li>\n</ul>";
  const once = clean(input);
  assert.strictEqual(once, "<h2>Title</h2>\n<p>Some <strong>bold</strong> text.</p>\n<ul><li>One</li>\n<li>Two</li>\n</ul>");
  assert.strictEqual(clean(once), once);
}

function testUnwrappedContainersKeepParagraphs(): void {
  const mixed = clean("<div><p>a</p>b</div>");
  assert.strictEqual(mixed, "<p>a</p>\n<p>b</p>");
  assert.strictEqual(clean(mixed), mixed);

  const cells = clean("<table><tr><td>Cell one</td><td>two</td></tr></table><p>After</p>");
  assert.strictEqual(cells, "<p>Cell onetwo</p>\n<p>After</p>");
  assert.strictEqual(clean(cells), cells);
}

testHeadings();
testEditorArtifacts();
testEntities();
testOptionalTags();
testStrip();
testIdempotence();
testUnwrappedContainersKeepParagraphs();
console.log("clean pipeline tests passed");
