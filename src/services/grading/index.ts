export { gradePhrase, gradeTextDetailed } from './grade.js';
export { classifyMistake, summarizeMistakes } from './align.js';
export { describeArticleMismatch } from './articles.js';
export type { ArticleMismatch } from './articles.js';
export type { MistakeKind, MistakeRecord, PhraseGrade } from './types.js';
