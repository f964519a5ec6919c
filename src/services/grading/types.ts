/**
 * Grading engine types
 */

/**
 * One word-level difference between the recognized and the expected text.
 * `recognized` is null for a dropped word, `correct` is null for an extra word.
 */
export interface MistakeRecord {
  position: number;
  recognized: string | null;
  correct: string | null;
  similarity: number;
}

export type MistakeKind = 'missing' | 'extra' | 'substitution';

export interface PhraseGrade {
  accepted: boolean;
  similarity: number;
}

export interface TextGrade extends PhraseGrade {
  mistakes: MistakeRecord[];
}
