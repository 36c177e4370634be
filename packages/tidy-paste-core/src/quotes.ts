// Typographic quotes → ASCII. Applied by callers, not by `clean`.
const QUOTE_REPLACEMENTS: Readonly<Record<string, string>> = Object.freeze({
  "«": '"',
  "»": '"',
  "‘": "'",
  "’": "'",
  "‚": "'",
  "‛": "'",
  "“": '"',
  "”": '"',
  "„": '"',
  "‟": '"',
  "‹": "'",
  "›": "'",
});

const QUOTE_PATTERN = /[«»‘-‟‹›]/g;

export function normalizeQuotes(text: string): string {
  return text.replace(QUOTE_PATTERN, (quote) => QUOTE_REPLACEMENTS[quote] ?? quote);
}
