import { type CleanOptions, OPTION_NAMES, type OptionName, type OptionsInput, type TagSpec } from "./types";

export const DEFAULT_CLEAN_OPTIONS: CleanOptions = Object.freeze({
  images: false,
  italics: false,
  links: false,
  strip: false,
  table: false,
});

// Tags that are always allowed unless `strip` is set.
export const BASELINE_ALLOWED_TAGS = "h1,h2,h3,h4,h5,p,strong,b,ul,ol,li,hr,pre,code";

// Added to the baseline when the matching option is on.
export const OPTION_TAG_ADDITIONS: Readonly<Partial<Record<OptionName, string>>> = Object.freeze({
  images: "img[src|alt]",
  links: "a[href|target]",
  italics: "em,i",
  table: "table,tr,td",
});

const OPTION_NAME_SET: ReadonlySet<string> = new Set(OPTION_NAMES);

const TAG_SPEC_ENTRY = /^([a-z][a-z0-9]*)(?:\[([^\]]*)\])?$/i;

/**
 * Configuration error with the offending option name
 */
export class ConfigError extends Error {
  constructor(
    public readonly option: string,
    message: string,
  ) {
    super(`[tidy-paste] ${message}`);
    this.name = "ConfigError";
  }
}

export function isOptionName(name: string): name is OptionName {
  return OPTION_NAME_SET.has(name);
}

/**
 * Merge `input` over `base`. Every key is checked before anything is taken,
 * so a rejected call leaves the caller's options exactly as they were.
 */
export function resolveOptions(input: OptionsInput = {}, base: CleanOptions = DEFAULT_CLEAN_OPTIONS): CleanOptions {
  const next: Record<OptionName, boolean> = { ...base };
  for (const [name, value] of Object.entries(input)) {
    if (!isOptionName(name)) {
      throw new ConfigError(name, `"${name}" does not exist as a settable option`);
    }
    if (value === undefined) continue;
    if (typeof value !== "boolean") {
      throw new ConfigError(name, `"${name}" must be a boolean, got ${typeof value}`);
    }
    next[name] = value;
  }
  return Object.freeze(next);
}

/**
 * Parse compact allowlist notation: `"p,strong,img[src|alt]"`.
 */
export function parseTagSpec(spec: string): TagSpec {
  const tagNames: string[] = [];
  const attributes: Record<string, string[]> = {};

  for (const rawEntry of spec.split(",")) {
    const entry = rawEntry.trim();
    if (!entry) continue;
    const match = TAG_SPEC_ENTRY.exec(entry);
    if (!match) {
      throw new ConfigError(entry, `invalid allowed-tag entry "${entry}"`);
    }
    const tagName = match[1].toLowerCase();
    if (!tagNames.includes(tagName)) {
      tagNames.push(tagName);
      attributes[tagName] = [];
    }
    const attributeList = match[2] ?? "";
    for (const attribute of attributeList.split("|")) {
      const name = attribute.trim();
      if (name && !attributes[tagName].includes(name)) {
        attributes[tagName].push(name);
      }
    }
  }

  return { tagNames, attributes };
}

export function buildAllowedTags(options: CleanOptions = DEFAULT_CLEAN_OPTIONS): TagSpec {
  if (options.strip) {
    return { tagNames: [], attributes: {} };
  }
  const entries = [BASELINE_ALLOWED_TAGS];
  for (const name of OPTION_NAMES) {
    const addition = OPTION_TAG_ADDITIONS[name];
    if (addition && options[name]) {
      entries.push(addition);
    }
  }
  return parseTagSpec(entries.join(","));
}
