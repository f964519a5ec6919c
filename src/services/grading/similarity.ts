/**
 * Word similarity for Greek speech recognition
 * Layered checks (exact, accents, [i] folding, inflection, edit distance)
 */
import { removeAccents } from './normalize.js';
import { canonicalizeForMatching } from './phonetic.js';

export const WORD_SCORES = Object.freeze({
  exact: 1.0,
  accentsOnly: 0.95,
  phoneticEquivalent: 0.92,
  inflectionMismatch: 0.65,
});

const MIDDLE_SIMILARITY_FLOOR = 0.7;
const MIDDLE_PENALTY = 0.2;
const SHARED_PREFIX_RATIO = 0.8;
const SHARED_PREFIX_FLOOR = 0.7;
const STEM_SIMILARITY_FLOOR = 0.67;
const STEM_PENALTY_FACTOR = 0.6;

/**
 * Calculate Levenshtein distance between two strings
 * Returns the minimum number of single-character edits (insertions, deletions, substitutions)
 */
export function levenshtein(a: string, b: string): number {
  // Keep the shorter string on the row so memory is O(min(a, b))
  const [longer, shorter] = a.length >= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return longer.length;

  let previous = Array.from({ length: shorter.length + 1 }, (_, j) => j);

  for (let i = 1; i <= longer.length; i++) {
    const current = [i];
    for (let j = 1; j <= shorter.length; j++) {
      const cost = longer[i - 1] === shorter[j - 1] ? 0 : 1;
      current.push(Math.min(
        previous[j] + 1,        // deletion
        current[j - 1] + 1,     // insertion
        previous[j - 1] + cost  // substitution
      ));
    }
    previous = current;
  }

  return previous[shorter.length];
}

function editSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1.0;
  return 1.0 - levenshtein(a, b) / maxLen;
}

function sharedPrefixLength(a: string, b: string): number {
  const limit = Math.min(a.length, b.length);
  let i = 0;
  while (i < limit && a[i] === b[i]) i++;
  return i;
}

/**
 * Similarity between two words in [0, 1]. Symmetric in its arguments.
 *
 * Different endings on a shared root ("φίλος" / "φίλη") score 0.65 so that
 * a wrong grammatical form still counts as a mistake.
 */
export function wordSimilarity(a: string, b: string): number {
  if (a === b) return WORD_SCORES.exact;

  const left = removeAccents(a);
  const right = removeAccents(b);

  if (left === right) return WORD_SCORES.accentsOnly;

  if (canonicalizeForMatching(left) === canonicalizeForMatching(right)) {
    return WORD_SCORES.phoneticEquivalent;
  }

  const minLen = Math.min(left.length, right.length);

  if (minLen >= 3 && left.slice(-2) !== right.slice(-2)) {
    if (left.slice(0, -2) === right.slice(0, -2)) {
      return WORD_SCORES.inflectionMismatch;
    }
  }

  // A different middle ("καλός" / "κακός") means a different word
  if (minLen >= 4) {
    const middleSimilarity = editSimilarity(left.slice(1, -1), right.slice(1, -1));
    if (middleSimilarity < MIDDLE_SIMILARITY_FLOOR) {
      return Math.max(0.0, editSimilarity(left, right) - MIDDLE_PENALTY);
    }
  }

  let similarity = editSimilarity(left, right);

  if (minLen > 0 && Math.abs(left.length - right.length) <= 1) {
    if (sharedPrefixLength(left, right) >= minLen * SHARED_PREFIX_RATIO) {
      similarity = Math.max(similarity, SHARED_PREFIX_FLOOR);
    }
  }

  if (minLen >= 4) {
    const stemSimilarity = editSimilarity(left.slice(0, 3), right.slice(0, 3));
    if (stemSimilarity < STEM_SIMILARITY_FLOOR) {
      similarity *= STEM_PENALTY_FACTOR;
    }
  }

  return Math.max(0.0, similarity);
}
