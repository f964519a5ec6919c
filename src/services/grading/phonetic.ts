/**
 * Phonetic folding of the Greek "i" sound, used for matching only.
 * The folded text is never shown to the learner.
 */

/**
 * Definite articles. Their spelling carries gender, number and case,
 * so they are compared exactly and never folded.
 */
export const GREEK_ARTICLES: ReadonlySet<string> = new Set([
  'ο', 'η', 'το', 'οι', 'τα', 'του', 'της', 'των',
]);

// Digraphs first, then the single letters, all pronounced [i]
const I_SOUND_DIGRAPHS = ['οι', 'ει', 'υι'] as const;
const I_SOUND_LETTERS = ['η', 'υ'] as const;

export function isArticle(token: string): boolean {
  return GREEK_ARTICLES.has(token);
}

function foldWord(word: string): string {
  if (isArticle(word)) return word;

  let folded = word;
  for (const digraph of I_SOUND_DIGRAPHS) {
    folded = folded.replaceAll(digraph, 'ι');
  }
  for (const letter of I_SOUND_LETTERS) {
    folded = folded.replaceAll(letter, 'ι');
  }
  return folded;
}

/**
 * Fold every spelling of the [i] sound onto "ι", word by word.
 * Expects normalized (accent-free, lowercase) text.
 */
export function canonicalizeForMatching(normalizedText: string): string {
  if (!normalizedText) return '';

  return normalizedText
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map(foldWord)
    .join(' ');
}
