import assert from "node:assert";

import { normalizeQuotes } from "../src/quotes";

assert.strictEqual(normalizeQuotes("“Hi” ‘there’ «a» ‹b› „c‟ ‚d‛"), "\"Hi\" 'there' \"a\" 'b' \"c\" 'd'");
assert.strictEqual(normalizeQuotes("plain \"ascii\" text"), "plain \"ascii\" text");
console.log("quote normalization tests passed");
