// String-level clean-up before parsing. These are approximations, not
// tag-aware rewrites: attribute values and <pre> content are not exempt.

import { DOCUMENT_HEADER } from "./fragment";

const WHITESPACE_RUN = /(?:\s|&nbsp;){2,}/g;
const WHITESPACE_AFTER_OPENING_TAG = /<(\w*)>(?:\s|&nbsp;)/g;
// Spreadsheet exports separate rows with doubled line breaks.
const LINE_BREAK_PAIR = /\s*<br\s*\/?>\s*<br\s*\/?>/gi;
// Empty table cells hold the grid together and stay.
const EMPTY_ELEMENT = /<(?!t[dh][\s>])(\w+)[^>]*>(?:\s|&nbsp;)*<\/\1>/g;

export function collapseWhitespace(html: string): string {
  return html.replace(WHITESPACE_RUN, " ").replace(WHITESPACE_AFTER_OPENING_TAG, "<$1>");
}

export function lineBreakPairsToParagraphs(html: string): string {
  return html.replace(LINE_BREAK_PAIR, "<p>");
}

/**
 * Remove elements holding nothing but whitespace. Single pass: an element
 * that only becomes empty after this pass stays.
 */
export function stripEmptyElements(html: string): string {
  return html.replace(EMPTY_ELEMENT, "");
}

export function preprocessHtml(html: string): string {
  const collapsed = collapseWhitespace(html);
  const paragraphs = lineBreakPairsToParagraphs(collapsed);
  return `${DOCUMENT_HEADER}${stripEmptyElements(paragraphs)}`;
}
