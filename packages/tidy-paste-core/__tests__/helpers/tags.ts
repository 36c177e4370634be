const TAG_NAME = /<\/?([a-zA-Z][a-zA-Z0-9]*)/g;

/** Lower-cased names of every tag appearing in serialized markup. */
export function tagNamesIn(markup: string): Set<string> {
  const names = new Set<string>();
  for (const match of markup.matchAll(TAG_NAME)) {
    names.add(match[1].toLowerCase());
  }
  return names;
}
