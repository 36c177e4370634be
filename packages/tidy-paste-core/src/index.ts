export * from "./types";
export { BLOCK_TAGS, isBlockTag } from "./block-tags";
export { isDebugEnabled, LOG_PREFIX } from "./debug";
export {
  BASELINE_ALLOWED_TAGS,
  buildAllowedTags,
  ConfigError,
  DEFAULT_CLEAN_OPTIONS,
  isOptionName,
  OPTION_TAG_ADDITIONS,
  parseTagSpec,
  resolveOptions,
} from "./options";
export { DOCUMENT_HEADER, parseFragment, serializeFragment, textContent } from "./fragment";
export { preprocessHtml } from "./preprocess";
export {
  confineToTags,
  DEFAULT_NORMALIZE_CONFIG,
  demoteHeadings,
  isPresentationalSpan,
  normalizeFragment,
  removeScriptElements,
  stripPresentationalSpans,
  synthesizeHeadings,
  unwrapBoldHeadings,
  unwrapListItemParagraphs,
} from "./normalize";
export { createSchema, sanitizeFragment } from "./sanitizer";
export { autop, reconstruct } from "./autop";
export { normalizeQuotes } from "./quotes";
export { clean, TidyPaste } from "./clean";
