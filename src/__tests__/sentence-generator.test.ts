import { beforeEach, describe, expect, it, vi } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

import {
  MAX_VOCABULARY_CONTEXT,
  OpenAISentenceGenerator,
  buildUserPrompt,
  parseGeneratedSentences,
} from '../services/sentence-generator.js';
import { GenerationError } from '../middleware/error.js';

describe('parseGeneratedSentences', () => {
  it('reads translation and Greek text from each line', () => {
    const content = [
      '1. I see my friend | Εγώ βλέπω τον φίλο.',
      '2) The mother reads | Η μητέρα διαβάζει',
      '',
      'no separator here',
      ' | Μόνο ελληνικά',
      'Only English |',
    ].join('\n');

    expect(parseGeneratedSentences(content)).toEqual([
      { translation: 'I see my friend', text: 'Εγώ βλέπω τον φίλο' },
      { translation: 'The mother reads', text: 'Η μητέρα διαβάζει' },
    ]);
  });

  it('returns nothing for empty content', () => {
    expect(parseGeneratedSentences('')).toEqual([]);
  });
});

describe('buildUserPrompt', () => {
  it('lists at most the allowed number of vocabulary entries', () => {
    const vocabulary = Array.from({ length: 60 }, (_, i) => ({
      word: `λέξη${i}`,
      translation: `word${i}`,
    }));

    const prompt = buildUserPrompt('  Write five sentences  ', vocabulary);
    const listed = prompt.split('\n').filter((line) => line.startsWith('- '));

    expect(listed).toHaveLength(MAX_VOCABULARY_CONTEXT);
    expect(listed[0]).toBe('- λέξη0 (word0)');
    expect(prompt.startsWith('Write five sentences\n')).toBe(true);
  });

  it('omits the vocabulary block when there is none', () => {
    expect(buildUserPrompt('Write two sentences', [])).toBe(
      'Write two sentences\n\nWrite the sentences as: Translation | Greek text\nOne sentence per line.'
    );
  });
});

describe('OpenAISentenceGenerator', () => {
  beforeEach(() => {
    create.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('returns the parsed sentences', async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: 'I drink coffee | Πίνω καφέ.' } }],
    });

    const generator = new OpenAISentenceGenerator('test-secret', 'gpt-4o-mini');
    const sentences = await generator.generate('Write one sentence', [
      { word: 'καφές', translation: 'coffee' },
    ]);

    expect(sentences).toEqual([{ translation: 'I drink coffee', text: 'Πίνω καφέ' }]);
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gpt-4o-mini', temperature: 0.7, max_tokens: 2000 })
    );
  });

  it('wraps request failures', async () => {
    create.mockRejectedValue(new Error('rate limited'));

    const generator = new OpenAISentenceGenerator('test-secret', 'gpt-4o-mini');
    const result = generator.generate('Write one sentence', []);

    await expect(result).rejects.toBeInstanceOf(GenerationError);
    await expect(result).rejects.toThrow('OpenAI request failed: rate limited');
  });

  it('rejects an answer without usable sentences', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: null } }] });

    const generator = new OpenAISentenceGenerator('test-secret', 'gpt-4o-mini');

    await expect(generator.generate('Write one sentence', [])).rejects.toThrow(
      'The model returned no usable sentences'
    );
  });
});
