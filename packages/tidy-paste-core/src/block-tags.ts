/**
 * Block-level tags: never wrapped in an auto-inserted paragraph, and given
 * forced line spacing during paragraph reconstruction.
 */
export const BLOCK_TAGS: readonly string[] = Object.freeze([
  "table",
  "thead",
  "tfoot",
  "caption",
  "col",
  "colgroup",
  "tbody",
  "tr",
  "td",
  "th",
  "div",
  "dl",
  "dd",
  "dt",
  "ul",
  "ol",
  "li",
  "pre",
  "select",
  "option",
  "form",
  "map",
  "area",
  "blockquote",
  "address",
  "math",
  "style",
  "p",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "hr",
  "fieldset",
  "noscript",
  "legend",
  "section",
  "article",
  "aside",
  "hgroup",
  "header",
  "footer",
  "nav",
  "figure",
  "figcaption",
  "details",
  "menu",
  "summary",
]);

export const BLOCK_TAG_SET: ReadonlySet<string> = new Set(BLOCK_TAGS);

const BLOCK_NAME_GROUP = `(?:${BLOCK_TAGS.join("|")})`;

// Source fragments for building block-aware patterns. The lookahead keeps
// `<p` from matching `<param` and `<li` from matching `<link`.
export const OPENING_BLOCK_TAG_SOURCE = `<${BLOCK_NAME_GROUP}(?=[\\s/>])[^>]*>`;
export const CLOSING_BLOCK_TAG_SOURCE = `<\\/${BLOCK_NAME_GROUP}\\s*>`;
export const ANY_BLOCK_TAG_SOURCE = `<\\/?${BLOCK_NAME_GROUP}(?=[\\s/>])[^>]*>`;

export function isBlockTag(tagName: string): boolean {
  return BLOCK_TAG_SET.has(tagName.toLowerCase());
}
