import { Router, type Router as ExpressRouter } from 'express';
import { ApiError, asyncHandler } from '../middleware/error.js';
import { optionalString, readBody, requireAudio, requireOneOf, requireString } from '../middleware/validate.js';
import type { SpeechRecognizer } from '../services/speech-to-text.js';
import type { GradeMode, SpeechGradeResponse } from '../types/api.types.js';
import { buildPhraseResponse, buildTextResponse } from './grading.js';

const GRADE_MODES: readonly GradeMode[] = ['phrase', 'text'];

export function createSpeechRouter(recognizer: SpeechRecognizer | null, defaultLanguage: string): ExpressRouter {
  const router = Router();

  function requireRecognizer(): SpeechRecognizer {
    if (!recognizer) {
      console.error('[Speech] ❌ DEEPGRAM_API_KEY not configured');
      throw new ApiError(
        503,
        'Speech recognition service not configured. Please set DEEPGRAM_API_KEY environment variable.'
      );
    }
    return recognizer;
  }

  /**
   * POST /api/speech/transcribe
   * Transcribe a voice answer
   */
  router.post('/transcribe', asyncHandler(async (req, res) => {
    const body = readBody(req);
    const audio = requireAudio(body);
    const locale = optionalString(body, 'locale') || defaultLanguage;

    const { transcript, confidence, words } = await requireRecognizer().transcribe(audio, locale);

    res.json({ transcript, confidence, language: locale, words });
  }));

  /**
   * POST /api/speech/grade
   * Transcribe a voice answer and grade it against the expected text
   */
  router.post('/grade', asyncHandler(async (req, res) => {
    const body = readBody(req);
    const audio = requireAudio(body);
    const reference = requireString(body, 'reference');
    const mode = requireOneOf(body, 'mode', GRADE_MODES, 'phrase');
    const locale = optionalString(body, 'locale') || defaultLanguage;

    const { transcript, confidence } = await requireRecognizer().transcribe(audio, locale);

    const grade = mode === 'phrase'
      ? buildPhraseResponse(transcript, reference)
      : buildTextResponse(transcript, reference);

    const response: SpeechGradeResponse = { ...grade, mode, transcript, confidence };
    console.log(`📊 [Speech] ${mode} graded: ${grade.accepted ? 'accepted' : 'rejected'} (${(grade.similarity * 100).toFixed(1)}%)`);

    res.json(response);
  }));

  return router;
}
