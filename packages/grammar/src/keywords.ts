import type { Rule } from "./types.js";
import { walkItems } from "./visitor.js";

const IDENTIFIER_LIKE = /^[A-Za-z_]\w*$/;

export function isIdentifierLike(value: string): boolean {
  return IDENTIFIER_LIKE.test(value);
}

/**
 * Collect keywords from the literals of `rules`. Identifier-like literals are
 * hard keywords when written `'x'` and soft keywords when written `"x"`;
 * a word used both ways is a hard keyword.
 */
export function collectKeywords(rules: readonly Rule[]): { keywords: Set<string>; softKeywords: Set<string> } {
  const keywords = new Set<string>();
  const softKeywords = new Set<string>();
  for (const rule of rules) {
    walkItems(rule.alternatives, (item) => {
      if (item.kind !== "literal" || !isIdentifierLike(item.value)) return;
      (item.soft ? softKeywords : keywords).add(item.value);
    });
  }
  for (const word of keywords) softKeywords.delete(word);
  return { keywords, softKeywords };
}
