/**
 * Practice sentence generation routes
 */
import { Router, type Router as ExpressRouter } from 'express';
import { ApiError, asyncHandler } from '../middleware/error.js';
import { readBody, requireArray, requireString } from '../middleware/validate.js';
import type { SentenceGenerator, VocabularyEntry } from '../services/sentence-generator.js';

function toVocabularyEntry(item: unknown, index: number): VocabularyEntry {
  if (
    typeof item === 'object' && item !== null &&
    'word' in item && typeof item.word === 'string' &&
    'translation' in item && typeof item.translation === 'string'
  ) {
    return { word: item.word, translation: item.translation };
  }
  throw new ApiError(400, `vocabulary[${index}] needs word and translation strings`);
}

export function createSentencesRouter(generator: SentenceGenerator | null): ExpressRouter {
  const router = Router();

  /**
   * POST /api/sentences/generate
   * Generate (translation, Greek text) pairs from the learner's vocabulary
   */
  router.post('/generate', asyncHandler(async (req, res) => {
    const body = readBody(req);
    const instruction = requireString(body, 'instruction', { maxLength: 1000 });
    const vocabulary = requireArray(body, 'vocabulary').map(toVocabularyEntry);

    if (!generator) {
      console.error('[Sentences] ❌ OPENAI_API_KEY not configured');
      throw new ApiError(503, 'Sentence generation not configured. Please set OPENAI_API_KEY environment variable.');
    }

    const sentences = await generator.generate(instruction, vocabulary);
    res.json({ sentences });
  }));

  return router;
}
