/**
 * Answer grading: decides whether a recognized answer is accepted.
 *
 * gradePhrase        word and short phrase drills (article-aware)
 * gradeTextDetailed  sentence reading, with a word-level list of mistakes
 */
import { align, tokenize } from './align.js';
import { normalize } from './normalize.js';
import { canonicalizeForMatching, isArticle } from './phonetic.js';
import { wordSimilarity } from './similarity.js';
import type { PhraseGrade, TextGrade } from './types.js';

/**
 * Tuned empirically against recognized Greek speech. Change them only
 * together with the regression tests in grade.test.ts.
 */
export const GRADING_THRESHOLDS = Object.freeze({
  phoneticMatch: 0.98,
  wholeStringAccept: 0.8,
  contentAccept: 0.85,
  contentReject: 0.75,
  articlePenalty: 0.7,
  safetyNet: 0.92,
  safetyNetScale: 0.95,
  phraseAccept: 0.82,
  textAccept: 0.85,
});

const T = GRADING_THRESHOLDS;

function isBlank(text: string): boolean {
  return !text || text.trim().length === 0;
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((token, i) => token === b[i]);
}

/**
 * Average, over the reference words, of the best similarity to a candidate
 * word. Each candidate word can be claimed once.
 */
function greedyMatchSimilarity(candidate: readonly string[], reference: readonly string[]): number {
  if (reference.length === 0) return 0.0;

  const claimed = new Set<number>();
  let total = 0.0;

  for (const expected of reference) {
    let bestIndex: number | null = null;
    let bestSimilarity = 0.0;

    for (let j = 0; j < candidate.length; j++) {
      if (claimed.has(j)) continue;
      const similarity = wordSimilarity(candidate[j], expected);
      if (similarity > bestSimilarity) {
        bestSimilarity = similarity;
        bestIndex = j;
      }
    }

    if (bestIndex !== null) claimed.add(bestIndex);
    total += bestSimilarity;
  }

  return total / reference.length;
}

function bestPairSimilarity(candidate: readonly string[], reference: readonly string[]): number {
  let best = 0.0;
  for (const word of candidate) {
    for (const expected of reference) {
      best = Math.max(best, wordSimilarity(word, expected));
    }
  }
  return best;
}

function splitArticles(tokens: readonly string[]): { articles: string[]; content: string[] } {
  return {
    articles: tokens.filter(isArticle),
    content: tokens.filter((token) => !isArticle(token)),
  };
}

/**
 * Grade a word or short phrase. Content words are matched fuzzily, articles
 * must match exactly: right noun with the wrong article is a wrong answer.
 */
export function gradePhrase(candidate: string, reference: string): PhraseGrade {
  if (isBlank(candidate)) return { accepted: false, similarity: 0.0 };

  // normalize() spells a bare numeral answer ("15") before anything else
  const said = normalize(candidate);
  const expected = normalize(reference);

  if (said === expected) return { accepted: true, similarity: 1.0 };

  if (canonicalizeForMatching(said) === canonicalizeForMatching(expected)) {
    return { accepted: true, similarity: T.phoneticMatch };
  }

  const saidTokens = tokenize(said);
  const expectedTokens = tokenize(expected);

  if (saidTokens.length === 0 || expectedTokens.length === 0) {
    const similarity = wordSimilarity(said, expected);
    return {
      accepted: similarity >= T.wholeStringAccept && similarity >= T.phraseAccept,
      similarity,
    };
  }

  const saidParts = splitArticles(saidTokens);
  const expectedParts = splitArticles(expectedTokens);
  const articlesMatch = sameSequence(saidParts.articles, expectedParts.articles);

  // Only articles on one side: no content to match, compare everything as is
  if (saidParts.content.length === 0 || expectedParts.content.length === 0) {
    const similarity = greedyMatchSimilarity(saidTokens, expectedTokens);
    return {
      accepted: articlesMatch && similarity >= T.wholeStringAccept && similarity >= T.phraseAccept,
      similarity,
    };
  }

  const contentSimilarity = greedyMatchSimilarity(saidParts.content, expectedParts.content);

  let accepted: boolean;
  let similarity: number;

  if (contentSimilarity < T.contentReject) {
    accepted = false;
    similarity = contentSimilarity;
  } else if (!articlesMatch) {
    accepted = false;
    similarity = contentSimilarity * T.articlePenalty;
  } else {
    accepted = contentSimilarity >= T.contentAccept;
    similarity = contentSimilarity;
  }

  const wholeSimilarity = wordSimilarity(said, expected);
  if (wholeSimilarity > T.safetyNet) {
    similarity = Math.max(similarity, wholeSimilarity * T.safetyNetScale);
  }

  // A near-perfect content word settles it, unless the content as a whole
  // was already rejected as wrong
  const bestContent = bestPairSimilarity(saidParts.content, expectedParts.content);
  if (bestContent > T.safetyNet) {
    if (!articlesMatch) {
      accepted = false;
    } else if (contentSimilarity >= T.contentReject) {
      accepted = true;
      similarity = Math.max(similarity, bestContent * T.safetyNetScale);
    }
  }

  return { accepted: accepted && similarity >= T.phraseAccept, similarity };
}

/**
 * Grade a read-aloud sentence. Every word has to come through cleanly:
 * a single mistake fails the sentence whatever the overall similarity.
 */
export function gradeTextDetailed(candidate: string, reference: string): TextGrade {
  if (isBlank(candidate)) return { accepted: false, similarity: 0.0, mistakes: [] };

  const said = normalize(candidate);
  const expected = normalize(reference);

  if (said === expected) return { accepted: true, similarity: 1.0, mistakes: [] };

  if (canonicalizeForMatching(said) === canonicalizeForMatching(expected)) {
    return { accepted: true, similarity: T.phoneticMatch, mistakes: [] };
  }

  const { similarity, mistakes } = align(tokenize(said), tokenize(expected));

  return {
    accepted: similarity >= T.textAccept && mistakes.length === 0,
    similarity,
    mistakes,
  };
}
