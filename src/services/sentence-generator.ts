/**
 * Practice sentence generation through the OpenAI chat API.
 * The model only sees the learner's own vocabulary as context.
 */
import OpenAI from 'openai';
import { GenerationError, errorMessage } from '../middleware/error.js';

export interface VocabularyEntry {
  word: string;
  translation: string;
}

export interface GeneratedSentence {
  translation: string;
  text: string;
}

export interface SentenceGenerator {
  generate(instruction: string, vocabulary: readonly VocabularyEntry[]): Promise<GeneratedSentence[]>;
}

export const MAX_VOCABULARY_CONTEXT = 50;

const SYSTEM_PROMPT = `You help people learn Greek.
Your task is to write Greek sentences together with their translations.

Rules:
1. Use only words from the provided vocabulary
2. Sentences must be grammatically correct
3. Answer format: every line is "Translation | Greek text"
4. No numbering and no other symbols
5. Keep the sentences simple enough for a learner

Example:
I see my friend | Εγώ βλέπω τον φίλο.
The mother reads the book | Η μητέρα διαβάζει το βιβλίο.`;

export function buildUserPrompt(instruction: string, vocabulary: readonly VocabularyEntry[]): string {
  const entries = vocabulary.slice(0, MAX_VOCABULARY_CONTEXT);
  const context = entries.length > 0
    ? `\nThe vocabulary contains these words:\n${entries.map((e) => `- ${e.word} (${e.translation})`).join('\n')}\n`
    : '';

  return `${instruction.trim()}
${context}
Write the sentences as: Translation | Greek text
One sentence per line.`;
}

/**
 * Parse "Translation | Greek text" lines. Numbering such as "1." or "2)"
 * and trailing periods are dropped; malformed lines are skipped.
 */
export function parseGeneratedSentences(content: string): GeneratedSentence[] {
  const sentences: GeneratedSentence[] = [];

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim().replace(/^\d+[.)]\s*/, '');
    const separator = line.indexOf('|');
    if (separator < 0) continue;

    const translation = line.slice(0, separator).trim().replace(/\.+$/, '');
    const text = line.slice(separator + 1).trim().replace(/\.+$/, '');
    if (translation && text) {
      sentences.push({ translation, text });
    }
  }

  return sentences;
}

export class OpenAISentenceGenerator implements SentenceGenerator {
  private readonly client: OpenAI;

  constructor(apiKey: string, private readonly model: string) {
    this.client = new OpenAI({ apiKey, timeout: 30_000 });
  }

  async generate(instruction: string, vocabulary: readonly VocabularyEntry[]): Promise<GeneratedSentence[]> {
    console.log(`🧠 [Sentences] Generating with ${this.model} (${Math.min(vocabulary.length, MAX_VOCABULARY_CONTEXT)} vocabulary entries)`);

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserPrompt(instruction, vocabulary) },
        ],
        temperature: 0.7,
        max_tokens: 2000,
      });
      content = completion.choices[0]?.message.content;
    } catch (error) {
      throw new GenerationError(`OpenAI request failed: ${errorMessage(error)}`, { cause: error });
    }

    const sentences = parseGeneratedSentences(content ?? '');
    if (sentences.length === 0) {
      throw new GenerationError('The model returned no usable sentences');
    }

    console.log(`✅ [Sentences] Generated ${sentences.length} sentences`);
    return sentences;
  }
}
