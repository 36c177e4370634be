// Paragraph reconstruction ("autop"): turns blank-line delimited text into
// <p>-wrapped, block-aware HTML. Each step rewrites the whole string and the
// order matters; later steps clean up what earlier ones over-inserted.

import { ANY_BLOCK_TAG_SOURCE, CLOSING_BLOCK_TAG_SOURCE, OPENING_BLOCK_TAG_SOURCE } from "./block-tags";
import { debugLog } from "./debug";

export interface PreformattedExtraction {
  text: string;
  blocks: Map<string, string>;
}

// Closing tags match with optional whitespace before `>` (`</embed >`).
const PRE_OPEN = /<pre[\s>]/i;
const PRE_CLOSE = /(<\/pre\s*>)/i;

const LINE_BREAK_PAIR = /<br\s*\/?>\s*<br\s*\/?>/gi;
const OPENING_BLOCK = new RegExp(`(${OPENING_BLOCK_TAG_SOURCE})`, "gi");
const CLOSING_BLOCK = new RegExp(`(${CLOSING_BLOCK_TAG_SOURCE})`, "gi");
const PARAM_TAG = /\s*<param([^>]*)>\s*/gi;
const EMBED_CLOSE = /\s*<\/embed\s*>\s*/gi;

const PARAGRAPH_BREAK = /\n\s*\n/;
const EMPTY_PARAGRAPH = /<p>\s*<\/p>/g;
const PARAGRAPH_BEFORE_CONTAINER_CLOSE = /<p>([^<]+)<\/(div|address|form)\s*>/g;
const PARAGRAPH_AROUND_BLOCK = new RegExp(`<p>\\s*(${ANY_BLOCK_TAG_SOURCE})\\s*</p>`, "gi");
const PARAGRAPH_AROUND_LIST_ITEM = /<p>(<li.+?)<\/p>/gi;
const PARAGRAPH_BEFORE_BLOCKQUOTE = /<p><blockquote([^>]*)>/gi;
const BLOCKQUOTE_BEFORE_PARAGRAPH_CLOSE = /<\/blockquote\s*><\/p>/gi;
const PARAGRAPH_OPEN_BEFORE_BLOCK = new RegExp(`<p>\\s*(${ANY_BLOCK_TAG_SOURCE})`, "gi");
const PARAGRAPH_CLOSE_AFTER_BLOCK = new RegExp(`(${ANY_BLOCK_TAG_SOURCE})\\s*</p>`, "gi");

const SCRIPT_OR_STYLE = /<(script|style)[\s\S]*?<\/\1\s*>/gi;
const PRESERVED_NEWLINE = "<autop-preserve-newline />";
const BARE_NEWLINE = /(?<!<br\s*\/?>)\s*\n/g;
const BREAK_AFTER_BLOCK = new RegExp(`(${ANY_BLOCK_TAG_SOURCE})\\s*<br\\s*/?>`, "gi");
const BREAK_BEFORE_BLOCK = new RegExp(`<br\\s*/?>(\\s*${ANY_BLOCK_TAG_SOURCE})`, "gi");
const TRAILING_NEWLINE_IN_PARAGRAPH = /\n<\/p>(\n?)$/;

function placeholderFor(index: number): string {
  return `<pre data-autop-pre="${index}"></pre>`;
}

/**
 * Swap every complete `<pre>…</pre>` for a numbered placeholder. Whatever
 * follows the last closing tag (including an unterminated `<pre`) is left
 * in place unprotected.
 */
export function extractPreformatted(text: string): PreformattedExtraction {
  const blocks = new Map<string, string>();
  if (!PRE_OPEN.test(text)) return { text, blocks };

  // Split with a capture group: segments and closing tags alternate.
  const pieces = text.split(PRE_CLOSE);
  let out = "";
  for (let i = 0; i + 1 < pieces.length; i += 2) {
    const segment = pieces[i];
    const closing = pieces[i + 1];
    const start = segment.search(PRE_OPEN);
    if (start === -1) {
      // Stray closing tag: keep it as ordinary text.
      out += segment + closing;
      continue;
    }
    const token = placeholderFor(blocks.size);
    blocks.set(token, segment.slice(start) + closing);
    out += segment.slice(0, start) + token;
  }
  out += pieces[pieces.length - 1];

  return { text: out, blocks };
}

export function restorePreformatted(text: string, blocks: ReadonlyMap<string, string>): string {
  let out = text;
  for (const [token, block] of blocks) {
    if (!out.includes(token)) {
      throw new Error(`Invariant violated: preformatted placeholder ${token} was lost`);
    }
    out = out.replace(token, () => block);
  }
  return out;
}

export function spaceOutBlocks(text: string): string {
  let out = text.replace(LINE_BREAK_PAIR, "\n\n");
  out = out.replace(OPENING_BLOCK, "\n$1");
  out = out.replace(CLOSING_BLOCK, "$1\n\n");
  out = out.replace(/\r\n|\r/g, "\n");
  if (/<object/i.test(out)) {
    // <param>/<embed> must sit flush inside <object>.
    out = out.replace(PARAM_TAG, "<param$1>").replace(EMBED_CLOSE, "</embed>");
  }
  return out.replace(/\n\n+/g, "\n\n");
}

export function wrapParagraphs(text: string): string {
  let out = "";
  for (const chunk of text.split(PARAGRAPH_BREAK)) {
    if (!chunk) continue;
    out += `<p>${chunk.replace(/^\n+|\n+$/g, "")}</p>\n`;
  }
  return out;
}

export function cleanUpParagraphs(text: string): string {
  let out = text.replace(EMPTY_PARAGRAPH, "");
  out = out.replace(PARAGRAPH_BEFORE_CONTAINER_CLOSE, "<p>$1</p></$2>");
  out = out.replace(PARAGRAPH_AROUND_BLOCK, "$1");
  out = out.replace(PARAGRAPH_AROUND_LIST_ITEM, "$1");
  out = out.replace(PARAGRAPH_BEFORE_BLOCKQUOTE, "<blockquote$1><p>");
  out = out.replace(BLOCKQUOTE_BEFORE_PARAGRAPH_CLOSE, "</p></blockquote>");
  out = out.replace(PARAGRAPH_OPEN_BEFORE_BLOCK, "$1");
  return out.replace(PARAGRAPH_CLOSE_AFTER_BLOCK, "$1");
}

export function insertLineBreaks(text: string): string {
  const protectedText = text.replace(SCRIPT_OR_STYLE, (region) => region.replace(/\n/g, PRESERVED_NEWLINE));
  return protectedText.replace(BARE_NEWLINE, "<br />\n").split(PRESERVED_NEWLINE).join("\n");
}

export function removeBreaksAtBlockBoundaries(text: string): string {
  return text.replace(BREAK_AFTER_BLOCK, "$1").replace(BREAK_BEFORE_BLOCK, "$1");
}

/**
 * Convert loosely delimited text into paragraph markup.
 *
 * Blank lines become paragraph boundaries, block-level tags are kept out of
 * paragraphs, and `<pre>` blocks come back byte for byte. With
 * `lineBreaks` on, the remaining single newlines become `<br />`.
 */
export function reconstruct(text: string, lineBreaks = true): string {
  if (text.trim() === "") return "";

  const extraction = extractPreformatted(`${text}\n`);
  let out = spaceOutBlocks(extraction.text);
  out = wrapParagraphs(out);
  out = cleanUpParagraphs(out);
  if (lineBreaks) {
    out = insertLineBreaks(out);
  }
  out = removeBreaksAtBlockBoundaries(out);
  out = out.replace(TRAILING_NEWLINE_IN_PARAGRAPH, "</p>$1");

  debugLog("reconstruct", { inputLength: text.length, preformatted: extraction.blocks.size, lineBreaks });
  return restorePreformatted(out, extraction.blocks);
}

export { reconstruct as autop };
