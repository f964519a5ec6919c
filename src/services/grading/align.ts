/**
 * Word-by-word alignment of a recognized sentence against the expected one.
 *
 * A single forward pass with a small search window around the cursor. Speech
 * recognition errors are local, so the window absorbs one inserted or dropped
 * word at a time. Runs of more than about three consecutive insertions or
 * deletions fall outside the window and are reported as separate mistakes.
 */
import { wordSimilarity } from './similarity.js';
import type { MistakeKind, MistakeRecord } from './types.js';

export const ALIGNMENT = Object.freeze({
  lookBehind: 1,
  lookAhead: 4,
  matchThreshold: 0.8,
  substitutionThreshold: 0.5,
});

export interface Alignment {
  similarity: number;
  mistakes: MistakeRecord[];
}

export function tokenize(normalizedText: string): string[] {
  return normalizedText.split(/\s+/).filter((token) => token.length > 0);
}

interface BestMatch {
  index: number | null;
  similarity: number;
}

function findBest(token: string, pool: readonly string[], from: number, to: number): BestMatch {
  const best: BestMatch = { index: null, similarity: 0 };
  for (let j = from; j < to; j++) {
    const similarity = wordSimilarity(pool[j], token);
    if (similarity > best.similarity) {
      best.index = j;
      best.similarity = similarity;
    }
  }
  return best;
}

/**
 * Align candidate tokens against reference tokens.
 * Mistake positions index into the reference; extra words take the position
 * of their closest reference word, or `reference.length` when none is close.
 */
export function align(candidate: readonly string[], reference: readonly string[]): Alignment {
  const mistakes: MistakeRecord[] = [];
  let cursor = 0;

  reference.forEach((expected, position) => {
    const from = Math.max(0, cursor - ALIGNMENT.lookBehind);
    const to = Math.min(candidate.length, cursor + ALIGNMENT.lookAhead);
    const best = findBest(expected, candidate, from, to);

    if (best.index !== null && best.similarity >= ALIGNMENT.matchThreshold) {
      cursor = best.index + 1;
      return;
    }

    if (best.index !== null && best.similarity > ALIGNMENT.substitutionThreshold) {
      mistakes.push({
        position,
        recognized: candidate[best.index],
        correct: expected,
        similarity: best.similarity,
      });
      cursor = best.index + 1;
      return;
    }

    // Dropped word: the cursor stays so the next reference word can use it
    mistakes.push({ position, recognized: null, correct: expected, similarity: 0.0 });
  });

  for (let j = cursor; j < candidate.length; j++) {
    const nearest = findBest(candidate[j], reference, 0, reference.length);
    if (nearest.similarity < ALIGNMENT.matchThreshold) {
      mistakes.push({
        position: nearest.index ?? reference.length,
        recognized: candidate[j],
        correct: null,
        similarity: nearest.similarity,
      });
    }
  }

  const total = Math.max(candidate.length, reference.length);
  // Extras come on top of missing words, so the count can exceed the length
  const similarity = total > 0 ? Math.max(0.0, (total - mistakes.length) / total) : 0.0;

  return { similarity, mistakes };
}

export function classifyMistake(mistake: MistakeRecord): MistakeKind {
  if (mistake.recognized === null) return 'missing';
  if (mistake.correct === null) return 'extra';
  return 'substitution';
}

/**
 * One line per mistake, at most `limit` of them, then an overflow line.
 */
export function summarizeMistakes(mistakes: readonly MistakeRecord[], limit = 10): string[] {
  const lines = mistakes.slice(0, limit).map((mistake, i) => {
    const n = i + 1;
    switch (classifyMistake(mistake)) {
      case 'missing':
        return `${n}. Missing: ${mistake.correct}`;
      case 'extra':
        return `${n}. Extra: ${mistake.recognized}`;
      case 'substitution':
        return `${n}. ${mistake.recognized} → ${mistake.correct}`;
    }
  });

  if (mistakes.length > limit) {
    lines.push(`... and ${mistakes.length - limit} more`);
  }
  return lines;
}
