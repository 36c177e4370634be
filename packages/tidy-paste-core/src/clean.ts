import { reconstruct } from "./autop";
import { debugLog } from "./debug";
import { finalizeOutput, parseFragment, pruneEmptyElements, serializeFragment, tidyWhitespace, withDocumentHeader } from "./fragment";
import { confineToTags, DEFAULT_NORMALIZE_CONFIG, normalizeFragment, removeScriptElements } from "./normalize";
import { buildAllowedTags, resolveOptions } from "./options";
import { preprocessHtml } from "./preprocess";
import { sanitizeFragment } from "./sanitizer";
import type { CleanOptions, NormalizeConfig, OptionsInput } from "./types";

/**
 * Normalize pasted HTML into a minimal fragment confined to the tags the
 * options allow. Pure: the same input and options give the same output.
 */
export function clean(html: string, options: OptionsInput = {}, config: NormalizeConfig = DEFAULT_NORMALIZE_CONFIG): string {
  const resolved = resolveOptions(options);
  const allowed = buildAllowedTags(resolved);

  let fragment = parseFragment(preprocessHtml(html), { impliedParagraphs: true });
  fragment = removeScriptElements(fragment);
  fragment = normalizeFragment(fragment, { firstPass: true, config });

  const filtered = sanitizeFragment(serializeFragment(fragment), allowed);
  debugLog("sanitize", { tags: allowed.tagNames.length, length: filtered.length });

  // With `strip` the output is plain text, so nothing gets wrapped.
  const reparsed = parseFragment(withDocumentHeader(filtered), { impliedParagraphs: allowed.tagNames.length > 0 });
  fragment = confineToTags(reparsed, allowed.tagNames);
  fragment = normalizeFragment(fragment, { firstPass: false, config });
  fragment = tidyWhitespace(pruneEmptyElements(fragment));

  return finalizeOutput(serializeFragment(fragment));
}

export class TidyPaste {
  private options: CleanOptions;

  constructor(
    options: OptionsInput = {},
    private readonly config: NormalizeConfig = DEFAULT_NORMALIZE_CONFIG,
  ) {
    this.options = resolveOptions(options);
  }

  /**
   * Throws `ConfigError` on the first unknown name; nothing is applied then.
   */
  setOptions(options: OptionsInput): void {
    this.options = resolveOptions(options, this.options);
  }

  getOptions(): CleanOptions {
    return this.options;
  }

  clean(html: string): string {
    return clean(html, this.options, this.config);
  }

  reconstruct(text: string, insertLineBreaks = true): string {
    return reconstruct(text, insertLineBreaks);
  }
}
