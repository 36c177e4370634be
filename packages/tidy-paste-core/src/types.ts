// Core contracts (public types) - tidy-paste

import type { Element, ElementContent, Root, RootContent } from "hast";

/**
 * Body-level content of a parsed document. The root's children are the
 * body's children; no html/head/body shell is kept.
 */
export type Fragment = Root;
export type FragmentNode = RootContent;
export type FragmentParent = Root | Element;

/**
 * Replacement for an element during a rewrite: the element itself, a
 * renamed copy, or a list of nodes spliced in its place (an empty list
 * removes it, the element's children unwrap it).
 */
export type ElementRewrite = (element: Element, parent: FragmentParent) => ElementContent | ElementContent[];

export const OPTION_NAMES = ["images", "italics", "links", "strip", "table"] as const;

export type OptionName = (typeof OPTION_NAMES)[number];

/**
 * Toggles for the allowed-tag set handed to the sanitizer.
 */
export type CleanOptions = Readonly<Record<OptionName, boolean>>;

/**
 * Loose option input, validated at runtime (unknown names are rejected).
 */
export type OptionsInput = Readonly<Record<string, boolean | undefined>>;

/**
 * Tags (and per-tag attributes) the sanitizer lets through.
 */
export interface TagSpec {
  readonly tagNames: readonly string[];
  readonly attributes: Readonly<Record<string, readonly string[]>>;
}

export interface NormalizeConfig {
  /** Longest bold-only paragraph (trimmed text length) promoted to a heading */
  headingMaxLength: number;
}

export interface NormalizeOptions {
  /** List-item paragraph unwrapping only runs on the first pass */
  firstPass: boolean;
  config?: NormalizeConfig;
}

export interface NormalizePass {
  name: string;
  firstPassOnly: boolean;
  run: (fragment: Fragment, config: NormalizeConfig) => Fragment;
}

export interface ParseFragmentOptions {
  /** Wrap loose top-level text (and inline runs) in paragraphs */
  impliedParagraphs?: boolean;
}
