/**
 * Grading routes
 * Score a recognized answer against the expected Greek text
 */
import { Router, type Router as ExpressRouter } from 'express';
import {
  classifyMistake,
  describeArticleMismatch,
  gradePhrase,
  gradeTextDetailed,
  summarizeMistakes,
} from '../services/grading/index.js';
import { readBody, requireString } from '../middleware/validate.js';
import type { PhraseGradeResponse, TextGradeResponse } from '../types/api.types.js';

const router: ExpressRouter = Router();

export function buildPhraseResponse(candidate: string, reference: string): PhraseGradeResponse {
  const { accepted, similarity } = gradePhrase(candidate, reference);
  return {
    accepted,
    similarity,
    articleMismatch: accepted ? null : describeArticleMismatch(candidate, reference),
  };
}

export function buildTextResponse(candidate: string, reference: string): TextGradeResponse {
  const { accepted, similarity, mistakes } = gradeTextDetailed(candidate, reference);
  return {
    accepted,
    similarity,
    mistakes: mistakes.map((mistake) => ({ ...mistake, kind: classifyMistake(mistake) })),
    summary: summarizeMistakes(mistakes),
  };
}

/**
 * POST /api/grading/phrase
 * Word or short phrase drill
 */
router.post('/phrase', (req, res) => {
  const body = readBody(req);
  const candidate = requireString(body, 'candidate', { allowEmpty: true });
  const reference = requireString(body, 'reference');

  res.json(buildPhraseResponse(candidate, reference));
});

/**
 * POST /api/grading/text
 * Sentence reading with a word-level list of mistakes
 */
router.post('/text', (req, res) => {
  const body = readBody(req);
  const candidate = requireString(body, 'candidate', { allowEmpty: true });
  const reference = requireString(body, 'reference');

  res.json(buildTextResponse(candidate, reference));
});

export default router;
