/**
 * Google Cloud Text-to-Speech Service
 * Reads Greek words and sentences aloud for listening drills
 */
import { TextToSpeechClient, protos } from '@google-cloud/text-to-speech';
import { SynthesisError, errorMessage } from '../middleware/error.js';

type ISynthesizeSpeechRequest = protos.google.cloud.texttospeech.v1.ISynthesizeSpeechRequest;

export type VoiceGender = 'male' | 'female';

export interface SynthesisOptions {
  voice?: VoiceGender;
  rate?: string;
}

export interface SpeechSynthesizer {
  synthesize(text: string, languageTag: string, options?: SynthesisOptions): Promise<Buffer>;
  voiceFor(languageTag: string, gender: VoiceGender): string;
}

/**
 * Greek voices. Wavenet for the female voice; the male voice is Standard only.
 */
export const GOOGLE_VOICE_MAP: Record<string, Record<VoiceGender, string>> = {
  'el-GR': {
    male: 'el-GR-Standard-B',
    female: 'el-GR-Wavenet-A',
  },
};

export function getRecommendedGoogleVoice(languageTag: string, gender: VoiceGender): string {
  return GOOGLE_VOICE_MAP[languageTag]?.[gender] || GOOGLE_VOICE_MAP['el-GR'][gender];
}

/**
 * Normalize rate: "-40%" -> 0.6, "1.0" -> 1.0, clamped to 0.25..4.0
 */
export function parseSpeakingRate(rate: string): number {
  const speakingRate = rate.includes('%')
    ? 1 + parseInt(rate.replace('%', ''), 10) / 100
    : parseFloat(rate);

  if (!Number.isFinite(speakingRate)) return 1.0;
  return Math.max(0.25, Math.min(4.0, speakingRate));
}

/**
 * Service account JSON pasted into an environment variable
 */
export function parseInlineCredentials(json: string): { client_email: string; private_key: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new SynthesisError('Invalid GOOGLE_CLOUD_CREDENTIALS_JSON format', { cause: error });
  }

  if (
    typeof parsed !== 'object' || parsed === null ||
    !('client_email' in parsed) || typeof parsed.client_email !== 'string' ||
    !('private_key' in parsed) || typeof parsed.private_key !== 'string'
  ) {
    throw new SynthesisError('GOOGLE_CLOUD_CREDENTIALS_JSON needs client_email and private_key');
  }

  return { client_email: parsed.client_email, private_key: parsed.private_key };
}

export class GoogleSpeechSynthesizer implements SpeechSynthesizer {
  private client: TextToSpeechClient | null = null;

  constructor(private readonly inlineCredentials: string) {}

  private getClient(): TextToSpeechClient {
    if (!this.client) {
      if (this.inlineCredentials) {
        // Inline credentials for hosts without a credentials file
        const credentials = parseInlineCredentials(this.inlineCredentials);
        console.log('✅ [Google TTS] Using inline credentials from GOOGLE_CLOUD_CREDENTIALS_JSON');
        this.client = new TextToSpeechClient({ credentials });
      } else {
        console.log('✅ [Google TTS] Using GOOGLE_APPLICATION_CREDENTIALS or default credentials');
        this.client = new TextToSpeechClient();
      }
    }
    return this.client;
  }

  voiceFor(languageTag: string, gender: VoiceGender): string {
    return getRecommendedGoogleVoice(languageTag, gender);
  }

  async synthesize(text: string, languageTag: string, options: SynthesisOptions = {}): Promise<Buffer> {
    const voiceName = this.voiceFor(languageTag, options.voice ?? 'female');
    const speakingRate = parseSpeakingRate(options.rate ?? '1.0');

    console.log(`🎤 [Google TTS] Synthesizing with voice: ${voiceName}, rate: ${speakingRate}`);

    const request: ISynthesizeSpeechRequest = {
      input: { text },
      voice: {
        languageCode: GOOGLE_VOICE_MAP[languageTag] ? languageTag : 'el-GR',
        name: voiceName,
      },
      audioConfig: {
        audioEncoding: 'MP3',
        speakingRate,
        pitch: 0,
        volumeGainDb: 0,
      },
    };

    let audioContent: string | Uint8Array | null | undefined;
    try {
      const [response] = await this.getClient().synthesizeSpeech(request);
      audioContent = response.audioContent;
    } catch (error) {
      if (error instanceof SynthesisError) throw error;
      console.error('❌ [Google TTS] Synthesis error:', {
        message: errorMessage(error),
        voice: voiceName,
        languageTag,
      });
      throw new SynthesisError(`Speech synthesis failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!audioContent) {
      throw new SynthesisError('No audio content in response');
    }

    const audioBuffer = typeof audioContent === 'string'
      ? Buffer.from(audioContent, 'base64')
      : Buffer.from(audioContent);
    console.log(`✅ [Google TTS] Audio generated successfully (${audioBuffer.length} bytes)`);

    return audioBuffer;
  }
}
