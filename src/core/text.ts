// Word handling shared by scoring, keyword analysis and tuple tagging.

const WORD_SPLIT = /[^\p{L}\p{N}'-]+/u;
const EDGE_PUNCTUATION = /^['-]+|['-]+$/g;

// Words that carry no topic when they appear in a draft prompt
export const PROMPT_STOPWORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'is', 'are', 'to', 'for', 'of', 'in', 'on', 'and', 'or',
  'find', 'me', 'some', 'get', 'best', 'good', 'how', 'what', 'why', 'when',
  'where', 'can', 'should', 'would', 'could',
]);

/**
 * Lowercase words in order of appearance, punctuation stripped
 */
export function tokenizeWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(WORD_SPLIT)
    .map((word) => word.replace(EDGE_PUNCTUATION, ''))
    .filter((word) => word.length > 0);
}

/**
 * Distinct words longer than `minLength - 1` that are not stopwords,
 * first occurrence first
 */
export function contentWords(
  text: string,
  stopwords: ReadonlySet<string> = PROMPT_STOPWORDS,
  minLength: number = 3
): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const word of tokenizeWords(text)) {
    if (word.length < minLength || stopwords.has(word) || seen.has(word)) continue;
    seen.add(word);
    result.push(word);
  }

  return result;
}

export function containsAny(haystack: string, phrases: readonly string[]): string | undefined {
  const lower = haystack.toLowerCase();
  return phrases.find((phrase) => lower.includes(phrase.toLowerCase()));
}

export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}
