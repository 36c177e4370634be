// Structural clean-up passes for editor artifacts. Every pass takes a
// fragment and returns a new one; the input tree is left untouched.

import type { Element } from "hast";

import { debugLog } from "./debug";
import { isElement, removeElements, renameElement, rewriteElements, significantChildren, textContent, unwrapElements } from "./fragment";
import type { Fragment, NormalizeConfig, NormalizeOptions, NormalizePass } from "./types";

export const DEFAULT_NORMALIZE_CONFIG: NormalizeConfig = Object.freeze({
  headingMaxLength: 50,
});

const BOLD_TAGS: ReadonlySet<string> = new Set(["strong", "b"]);

// hast property names (`class` is `className`, `xml:lang` is `xmlLang`).
const PRESENTATIONAL_SPAN_PROPERTIES: ReadonlySet<string> = new Set(["style", "className", "lang", "xmlLang", "dir"]);

export function demoteHeadings(fragment: Fragment): Fragment {
  return rewriteElements(fragment, (element) => (element.tagName === "h1" ? renameElement(element, "h2") : element));
}

/**
 * `<p><strong>Short line</strong></p>` at the top level becomes
 * `<h2>Short line</h2>`; editors fake headings this way.
 */
export function synthesizeHeadings(fragment: Fragment, config: NormalizeConfig = DEFAULT_NORMALIZE_CONFIG): Fragment {
  return {
    ...fragment,
    children: fragment.children.map((child) => (isElement(child, "p") ? paragraphToHeading(child, config) : child)),
  };
}

function paragraphToHeading(paragraph: Element, config: NormalizeConfig): Element {
  const content = significantChildren(paragraph);
  if (content.length !== 1) return paragraph;
  const [run] = content;
  if (!isElement(run, BOLD_TAGS)) return paragraph;
  const length = textContent(run).trim().length;
  if (length === 0 || length > config.headingMaxLength) return paragraph;
  return { ...renameElement(paragraph, "h2"), children: run.children };
}

export function unwrapBoldHeadings(fragment: Fragment): Fragment {
  return rewriteElements(fragment, (element) => {
    if (element.tagName !== "h2") return element;
    const content = significantChildren(element);
    const [only] = content;
    if (content.length !== 1 || !isElement(only, BOLD_TAGS)) return element;
    return { ...element, children: only.children };
  });
}

export function isPresentationalSpan(element: Element): boolean {
  if (element.tagName !== "span") return false;
  return Object.keys(element.properties).every((name) => PRESENTATIONAL_SPAN_PROPERTIES.has(name));
}

export function stripPresentationalSpans(fragment: Fragment): Fragment {
  return unwrapElements(fragment, isPresentationalSpan);
}

export function unwrapListItemParagraphs(fragment: Fragment): Fragment {
  return unwrapElements(fragment, (element, parent) => element.tagName === "p" && isElement(parent, "li"));
}

export function removeScriptElements(fragment: Fragment): Fragment {
  return removeElements(fragment, (element) => element.tagName === "script");
}

/**
 * Unwrap every element outside `tagNames`. The parser implies wrappers
 * (`tbody` around bare table rows) the allowlist never produced.
 */
export function confineToTags(fragment: Fragment, tagNames: Iterable<string>): Fragment {
  const allowed = new Set(tagNames);
  return unwrapElements(fragment, (element) => !allowed.has(element.tagName));
}

export const NORMALIZE_PASSES: readonly NormalizePass[] = [
  { name: "demote-headings", firstPassOnly: false, run: (fragment) => demoteHeadings(fragment) },
  { name: "synthesize-headings", firstPassOnly: false, run: (fragment, config) => synthesizeHeadings(fragment, config) },
  { name: "unwrap-bold-headings", firstPassOnly: false, run: (fragment) => unwrapBoldHeadings(fragment) },
  { name: "strip-presentational-spans", firstPassOnly: false, run: (fragment) => stripPresentationalSpans(fragment) },
  { name: "unwrap-list-item-paragraphs", firstPassOnly: true, run: (fragment) => unwrapListItemParagraphs(fragment) },
];

export function normalizeFragment(fragment: Fragment, options: NormalizeOptions): Fragment {
  const config = options.config ?? DEFAULT_NORMALIZE_CONFIG;
  let next = fragment;
  for (const pass of NORMALIZE_PASSES) {
    if (pass.firstPassOnly && !options.firstPass) continue;
    next = pass.run(next, config);
    debugLog("normalize", { pass: pass.name, firstPass: options.firstPass, nodes: next.children.length });
  }
  return next;
}
