import { Router, type Router as ExpressRouter } from 'express';
import { ApiError, asyncHandler } from '../middleware/error.js';
import { optionalString, readBody, requireOneOf, requireString } from '../middleware/validate.js';
import { GOOGLE_VOICE_MAP, type SpeechSynthesizer, type VoiceGender } from '../services/google-cloud-tts.js';

const VOICES: readonly VoiceGender[] = ['female', 'male'];
export const MAX_TTS_TEXT_LENGTH = 500;
export const MAX_TTS_CACHE_ENTRIES = 100;

export function createTtsRouter(synthesizer: SpeechSynthesizer | null, defaultLanguage: string): ExpressRouter {
  const router = Router();

  // Cache of generated audio (key: text-locale-voice-rate), base64 encoded
  const audioCache = new Map<string, string>();

  /**
   * POST /api/tts/synthesize
   * Generate speech audio for a word or sentence
   */
  router.post('/synthesize', asyncHandler(async (req, res) => {
    const body = readBody(req);
    const text = requireString(body, 'text', { maxLength: MAX_TTS_TEXT_LENGTH });
    const locale = optionalString(body, 'locale') || defaultLanguage;
    const voice = requireOneOf(body, 'voice', VOICES, 'female');
    const rate = optionalString(body, 'rate') || '1.0';

    if (!synthesizer) {
      throw new ApiError(503, 'Speech synthesis service not configured');
    }

    const voiceName = synthesizer.voiceFor(locale, voice);
    const cacheKey = `${text}-${locale}-${voice}-${rate}`;

    const cachedAudio = audioCache.get(cacheKey);
    if (cachedAudio !== undefined) {
      console.log(`💾 [TTS] Using cached audio for: "${text.substring(0, 50)}" (${voiceName})`);
      return res.json({
        audio: cachedAudio,
        contentType: 'audio/mp3',
        voice: voiceName,
        cached: true,
      });
    }

    const audio = (await synthesizer.synthesize(text, locale, { voice, rate })).toString('base64');
    audioCache.set(cacheKey, audio);

    // Evict the oldest entry once the cache is full
    if (audioCache.size > MAX_TTS_CACHE_ENTRIES) {
      const firstKey = audioCache.keys().next().value;
      if (firstKey !== undefined) audioCache.delete(firstKey);
    }

    console.log(`✅ [TTS] Generated audio for: "${text.substring(0, 50)}" (cache size: ${audioCache.size})`);

    res.json({
      audio,
      contentType: 'audio/mp3',
      voice: voiceName,
      cached: false,
    });
  }));

  /**
   * GET /api/tts/voices
   * List available Greek voices
   */
  router.get('/voices', (req, res) => {
    const voices = Object.entries(GOOGLE_VOICE_MAP).flatMap(([locale, genders]) =>
      Object.entries(genders).map(([gender, voiceName]) => ({
        locale,
        gender,
        voice: voiceName,
        language: locale.split('-')[0],
        region: locale.split('-')[1],
      }))
    );

    res.json({ voices, provider: 'Google Cloud Text-to-Speech' });
  });

  return router;
}
