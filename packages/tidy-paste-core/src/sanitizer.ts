import type { Root } from "hast";
import rehypeParse from "rehype-parse";
import rehypeSanitize, { defaultSchema } from "rehype-sanitize";
import rehypeStringify from "rehype-stringify";
import { type Plugin, unified } from "unified";

import { warnLog } from "./debug";
import { pruneEmptyElements } from "./fragment";
import type { TagSpec } from "./types";

type Schema = typeof defaultSchema;

export function createSchema(spec: TagSpec): Schema {
  const attributes: Record<string, string[]> = {};
  for (const tagName of spec.tagNames) {
    attributes[tagName] = [...(spec.attributes[tagName] ?? [])];
  }

  return {
    ...defaultSchema,
    tagNames: [...spec.tagNames],
    attributes,
    required: {},
    strip: ["script", "style"],
    allowComments: false,
    allowDoctypes: false,
  };
}

const removeEmptyElements: Plugin<[], Root> = function () {
  return (tree) => pruneEmptyElements(tree);
};

function createSanitizer(spec: TagSpec) {
  return unified()
    .use(rehypeParse, { fragment: true })
    .use(rehypeSanitize, createSchema(spec))
    .use(removeEmptyElements)
    .use(rehypeStringify, {
      closeSelfClosing: true,
      characterReferences: { useNamedReferences: true },
    })
    .freeze();
}

/**
 * Restrict markup to the tags and attributes in `allowed`. Disallowed
 * elements are replaced by their children; script and style content is
 * dropped, as are comments, inline styles and empty elements.
 */
export function sanitizeFragment(html: string, allowed: TagSpec): string {
  if (!html) return "";
  try {
    return createSanitizer(allowed).processSync(html).toString();
  } catch (error) {
    warnLog("Failed to sanitize HTML fragment:", error);
    return "";
  }
}
