/**
 * Shared TypeScript types for API routes
 */
import type { ArticleMismatch, MistakeKind, MistakeRecord, PhraseGrade } from '../services/grading/index.js';

export type GradeMode = 'phrase' | 'text';

// ============================================================================
// API Response Types
// ============================================================================

export interface PhraseGradeResponse extends PhraseGrade {
  articleMismatch: ArticleMismatch | null;
}

export interface MistakeView extends MistakeRecord {
  kind: MistakeKind;
}

export interface TextGradeResponse {
  accepted: boolean;
  similarity: number;
  mistakes: MistakeView[];
  summary: string[];
}

export type SpeechGradeResponse = (PhraseGradeResponse | TextGradeResponse) & {
  mode: GradeMode;
  transcript: string;
  confidence: number;
};
