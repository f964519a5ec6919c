/**
 * Speech recognition
 * Deepgram prerecorded transcription of a learner's voice answer
 */
import { createClient } from '@deepgram/sdk';
import { RecognitionError, errorMessage } from '../middleware/error.js';

export interface Transcription {
  transcript: string;
  confidence: number;
  language: string;
  words: number;
}

export interface SpeechRecognizer {
  transcribe(audio: Buffer, languageTag: string): Promise<Transcription>;
}

/**
 * Deepgram takes a bare language code ("el"), not a locale ("el-GR")
 */
export function deepgramLanguage(languageTag: string): string {
  const [language] = languageTag.trim().toLowerCase().split(/[-_]/);
  return language || 'el';
}

export class DeepgramRecognizer implements SpeechRecognizer {
  private readonly client: ReturnType<typeof createClient>;

  constructor(apiKey: string) {
    this.client = createClient(apiKey);
  }

  async transcribe(audio: Buffer, languageTag: string): Promise<Transcription> {
    const language = deepgramLanguage(languageTag);

    console.log(`🎤 [Speech] Transcribing audio (${audio.length} bytes, language: ${language})`);

    let response;
    try {
      response = await this.client.listen.prerecorded.transcribeFile(audio, {
        model: 'nova-2',
        language,
        smart_format: true,
        punctuate: true,
        diarize: false,
        multichannel: false,
      });
    } catch (error) {
      throw new RecognitionError(`Transcription failed: ${errorMessage(error)}`, { cause: error });
    }

    const { result, error } = response;
    if (error) {
      throw new RecognitionError(`Transcription failed: ${error.message}`, { cause: error });
    }

    const alternative = result?.results?.channels?.[0]?.alternatives?.[0];
    const transcript = alternative?.transcript?.trim() || '';

    if (!transcript) {
      throw new RecognitionError('No speech detected in audio');
    }

    const confidence = alternative?.confidence || 0;
    console.log(`✅ [Speech] Transcription successful: "${transcript.substring(0, 100)}${transcript.length > 100 ? '...' : ''}"`);
    console.log(`📊 [Speech] Confidence: ${(confidence * 100).toFixed(1)}%`);

    return {
      transcript,
      confidence,
      language: languageTag,
      words: alternative?.words?.length || 0,
    };
  }
}
