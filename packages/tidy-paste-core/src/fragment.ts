// Parse/serialize primitives and pure structural helpers over hast trees.
// Nodes are never mutated: every helper returns new objects.

import type { Element, ElementContent, Nodes, RootContent, Text } from "hast";
import rehypeParse from "rehype-parse";
import rehypeStringify from "rehype-stringify";
import { unified } from "unified";

import { BLOCK_TAG_SET } from "./block-tags";
import type { ElementRewrite, Fragment, FragmentParent, ParseFragmentOptions } from "./types";

// Full-document parse: the header puts the content in <body> and pins UTF-8.
export const DOCUMENT_HEADER = '<!DOCTYPE html><meta charset="utf-8">';

const documentParser = unified().use(rehypeParse, { fragment: false }).freeze();

const fragmentStringifier = unified()
  .use(rehypeStringify, {
    closeSelfClosing: true,
    characterReferences: { useNamedReferences: true },
  })
  .freeze();

// JS `\s` covers U+00A0, so `&nbsp;` text counts as whitespace throughout.
const WHITESPACE_ONLY = /^\s*$/;
const WHITESPACE_RUN = /\s{2,}/g;

// Legitimately empty elements, kept by empty-element pruning.
const KEEP_WHEN_EMPTY: ReadonlySet<string> = new Set(["br", "hr", "img", "td", "th", "col", "area", "embed", "param", "source", "track", "wbr", "input"]);

export function isElement(node: Nodes | null | undefined, tagNames?: string | ReadonlySet<string>): node is Element {
  if (!node || node.type !== "element") return false;
  if (tagNames === undefined) return true;
  return typeof tagNames === "string" ? node.tagName === tagNames : tagNames.has(node.tagName);
}

export function isText(node: Nodes | null | undefined): node is Text {
  return Boolean(node && node.type === "text");
}

export function isWhitespaceText(node: Nodes | null | undefined): boolean {
  return isText(node) && WHITESPACE_ONLY.test(node.value);
}

export function textContent(node: Nodes): string {
  if (node.type === "text") return node.value;
  if (node.type === "element" || node.type === "root") {
    let out = "";
    for (const child of node.children) {
      out += textContent(child);
    }
    return out;
  }
  return "";
}

/**
 * Children that carry content, ignoring whitespace-only text.
 */
export function significantChildren(element: Element): ElementContent[] {
  return element.children.filter((child) => !isWhitespaceText(child));
}

/**
 * Same attributes and children under a new tag name.
 */
export function renameElement(element: Element, tagName: string): Element {
  return { ...element, tagName, properties: { ...element.properties } };
}

/**
 * Rewrite every element bottom-up. Children are rewritten before their
 * parent is handed to `rewrite`; the parent passed along is the one in the
 * input tree.
 */
export function rewriteElements(fragment: Fragment, rewrite: ElementRewrite): Fragment {
  const children: RootContent[] = [];
  for (const child of fragment.children) {
    if (child.type === "element") {
      children.push(...toList(rewriteElement(child, fragment, rewrite)));
    } else {
      children.push(child);
    }
  }
  return { ...fragment, children };
}

function rewriteElement(element: Element, parent: FragmentParent, rewrite: ElementRewrite): ElementContent | ElementContent[] {
  const children: ElementContent[] = [];
  for (const child of element.children) {
    if (child.type === "element") {
      children.push(...toList(rewriteElement(child, element, rewrite)));
    } else {
      children.push(child);
    }
  }
  return rewrite({ ...element, children }, parent);
}

function toList(result: ElementContent | ElementContent[]): ElementContent[] {
  return Array.isArray(result) ? result : [result];
}

/**
 * Drop matching elements together with their content.
 */
export function removeElements(fragment: Fragment, predicate: (element: Element) => boolean): Fragment {
  return rewriteElements(fragment, (element) => (predicate(element) ? [] : element));
}

/**
 * Replace matching elements by their children.
 */
export function unwrapElements(fragment: Fragment, predicate: (element: Element, parent: FragmentParent) => boolean): Fragment {
  return rewriteElements(fragment, (element, parent) => (predicate(element, parent) ? element.children : element));
}

export function withDocumentHeader(html: string): string {
  return `${DOCUMENT_HEADER}${html}`;
}

/**
 * Parse a full document and keep the body's children as the fragment.
 */
export function parseFragment(html: string, options: ParseFragmentOptions = {}): Fragment {
  const document = documentParser.parse(html);
  const htmlElement = document.children.find((child): child is Element => isElement(child, "html"));
  const body = htmlElement?.children.find((child): child is Element => isElement(child, "body"));
  const children: RootContent[] = body ? [...body.children] : [];
  return {
    type: "root",
    children: options.impliedParagraphs ? wrapLooseContent(children) : children,
  };
}

function hasBlockDescendant(element: Element): boolean {
  return element.children.some((child) => child.type === "element" && (BLOCK_TAG_SET.has(child.tagName) || hasBlockDescendant(child)));
}

// Inline wrappers around block content (`<b><p>…</p></b>` from some editors) stay unwrapped.
function isPhrasing(node: RootContent): boolean {
  if (node.type === "text" || node.type === "comment") return true;
  if (node.type === "element") return !BLOCK_TAG_SET.has(node.tagName) && node.tagName !== "script" && !hasBlockDescendant(node);
  return false;
}

function hasContent(nodes: ElementContent[]): boolean {
  return nodes.some((node) => node.type === "element" || (node.type === "text" && !WHITESPACE_ONLY.test(node.value)));
}

function trimEdges(nodes: ElementContent[]): ElementContent[] {
  const out = [...nodes];
  const first = out[0];
  if (first?.type === "text") out[0] = { ...first, value: first.value.replace(/^\s+/, "") };
  const last = out[out.length - 1];
  if (last?.type === "text") out[out.length - 1] = { ...last, value: last.value.replace(/\s+$/, "") };
  return out;
}

// Loose body text gets an implied paragraph, the way permissive parsers treat it.
function wrapLooseContent(nodes: RootContent[]): RootContent[] {
  const out: RootContent[] = [];
  let run: ElementContent[] = [];

  const flush = () => {
    if (run.length === 0) return;
    if (!hasContent(run)) {
      out.push(...run);
      run = [];
      return;
    }
    let start = 0;
    let end = run.length;
    while (start < end && isWhitespaceText(run[start])) start++;
    while (end > start && isWhitespaceText(run[end - 1])) end--;
    out.push(...run.slice(0, start));
    out.push({ type: "element", tagName: "p", properties: {}, children: trimEdges(run.slice(start, end)) });
    out.push(...run.slice(end));
    run = [];
  };

  for (const node of nodes) {
    if (node.type !== "doctype" && isPhrasing(node)) {
      run.push(node);
      continue;
    }
    flush();
    out.push(node);
  }
  flush();

  return out;
}

/**
 * Drop elements left holding nothing but whitespace (U+00A0 included),
 * innermost first. Void elements and table cells stay.
 */
export function pruneEmptyElements(fragment: Fragment): Fragment {
  const children: RootContent[] = [];
  for (const child of fragment.children) {
    if (child.type !== "element") {
      children.push(child);
      continue;
    }
    const pruned = pruneElement(child);
    if (pruned) children.push(pruned);
  }
  return { ...fragment, children };
}

function pruneElement(element: Element): Element | null {
  const children: ElementContent[] = [];
  for (const child of element.children) {
    if (child.type !== "element") {
      children.push(child);
      continue;
    }
    const pruned = pruneElement(child);
    if (pruned) children.push(pruned);
  }
  if (!KEEP_WHEN_EMPTY.has(element.tagName) && children.every((child) => child.type === "text" && WHITESPACE_ONLY.test(child.value))) {
    return null;
  }
  return { ...element, children };
}

/**
 * Settle whitespace the way `preprocessHtml` leaves it: adjacent text merged,
 * runs collapsed to one space, no whitespace right after an opening tag
 * without attributes, top-level text trimmed. Serialized output then passes
 * through the pre-cleaner unchanged.
 */
export function tidyWhitespace(fragment: Fragment): Fragment {
  const nodes = fragment.children.filter((child): child is ElementContent => child.type !== "doctype");
  const children: RootContent[] = [];
  for (const node of tidyList(nodes, false)) {
    if (node.type !== "text") {
      children.push(node);
      continue;
    }
    const value = node.value.trim();
    if (value) children.push({ ...node, value });
  }
  return { ...fragment, children };
}

function tidyList(nodes: readonly ElementContent[], dropLeadingSpace: boolean): ElementContent[] {
  const merged: ElementContent[] = [];
  for (const node of nodes) {
    const previous = merged[merged.length - 1];
    if (node.type === "text" && previous?.type === "text") {
      merged[merged.length - 1] = { ...previous, value: previous.value + node.value };
    } else {
      merged.push(node);
    }
  }

  const out: ElementContent[] = [];
  for (const node of merged) {
    if (node.type === "element") {
      out.push({ ...node, children: tidyList(node.children, Object.keys(node.properties).length === 0) });
      continue;
    }
    if (node.type !== "text") {
      out.push(node);
      continue;
    }
    let value = node.value.replace(WHITESPACE_RUN, " ");
    if (dropLeadingSpace && out.length === 0) value = value.replace(/^\s/, "");
    if (value) out.push({ ...node, value });
  }
  return out;
}

export function serializeNode(node: RootContent): string {
  return fragmentStringifier.stringify({ type: "root", children: [node] });
}

/**
 * One top-level node per line, blank-line runs collapsed, trailing
 * whitespace run removed.
 */
export function serializeFragment(fragment: Fragment): string {
  let output = "";
  for (const child of fragment.children) {
    if (child.type === "doctype" || isWhitespaceText(child)) continue;
    output += `${serializeNode(child)}\n`;
  }
  return collapseBlankLines(output);
}

export function collapseBlankLines(markup: string): string {
  return markup.replace(/(\n\s*){2,}/g, "\n").replace(/\s\s+$/, "");
}

export function finalizeOutput(markup: string): string {
  const output = collapseBlankLines(markup.replace(/\u00a0/g, " "));
  return output.endsWith("\n") ? output.slice(0, -1) : output;
}
