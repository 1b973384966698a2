const COMBINING_MARKS = /[\u0300-\u036f]/g;
const WORD_CHAR = /[\p{L}\p{N}]/u;

/**
 * Case- and accent-insensitive form used for keyword matching only.
 * "Despedido SIN causa" and "despedido sin causa" fold to the same string, as do
 * "petición" and "peticion".
 */
export function foldText(value: string): string {
  return value.normalize('NFD').replace(COMBINING_MARKS, '').toLowerCase();
}

export function normalizeFacts(facts: readonly string[]): string[] {
  return facts.map((fact) => fact.trim()).filter(Boolean);
}

export function buildCorpus(parts: readonly string[]): string {
  return foldText(parts.join('\n'));
}

// A keyword matches at the start of a word: "despid" finds "despido" and
// "despidieron", while "robo" does not fire inside "arrobo".
export function containsKeyword(corpus: string, keyword: string): boolean {
  const needle = foldText(keyword);
  let from = 0;

  while (from <= corpus.length) {
    const index = corpus.indexOf(needle, from);
    if (index === -1) return false;
    if (index === 0 || !WORD_CHAR.test(corpus[index - 1])) return true;
    from = index + 1;
  }

  return false;
}

export function matchedKeywords(corpus: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => containsKeyword(corpus, keyword));
}

export type KeywordPredicate = {
  all?: readonly string[];
  any?: readonly string[];
  none?: readonly string[];
};

export function matchesPredicate(corpus: string, predicate: KeywordPredicate): boolean {
  const { all, any, none } = predicate;

  if (all && !all.every((keyword) => containsKeyword(corpus, keyword))) return false;
  if (any && !any.some((keyword) => containsKeyword(corpus, keyword))) return false;
  if (none && none.some((keyword) => containsKeyword(corpus, keyword))) return false;

  return true;
}
