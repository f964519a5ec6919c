import { describe, expect, it } from 'vitest';
import { GRADING_THRESHOLDS, gradePhrase, gradeTextDetailed } from '../services/grading/grade.js';

describe('gradePhrase', () => {
  it('accepts an identical answer with similarity 1', () => {
    expect(gradePhrase('ο φίλος', 'ο φίλος')).toEqual({ accepted: true, similarity: 1 });
  });

  it('accepts a recognized numeral with trailing punctuation', () => {
    expect(gradePhrase('15.', 'δεκαπέντε')).toEqual({ accepted: true, similarity: 1 });
  });

  it('ignores accents', () => {
    const result = gradePhrase('εγω', 'εγώ');
    expect(result.accepted).toBe(true);
    expect(result.similarity).toBeGreaterThanOrEqual(0.98);
  });

  it('accepts another spelling of the [i] sound at 0.98', () => {
    expect(gradePhrase('φιλι', 'φίλη')).toEqual({ accepted: true, similarity: 0.98 });
  });

  it('accepts a spoken numeral written as digits', () => {
    expect(gradePhrase('15', 'δεκαπέντε')).toEqual({ accepted: true, similarity: 1 });
  });

  it('rejects the right noun with the wrong article', () => {
    const result = gradePhrase('η φίλος', 'ο φίλος');
    expect(result.accepted).toBe(false);
    expect(result.similarity).toBeCloseTo(0.7, 10);
  });

  it('rejects a wrong grammatical form', () => {
    expect(gradePhrase('φίλη', 'φίλο')).toEqual({ accepted: false, similarity: 0.65 });
  });

  it('rejects an unrelated word', () => {
    expect(gradePhrase('σκύλος', 'γάτα')).toEqual({ accepted: false, similarity: 0 });
  });

  it('rejects content between the reject and accept bars', () => {
    const result = gradePhrase('σπιτια', 'σπίτι');
    expect(result.accepted).toBe(false);
    expect(result.similarity).toBeCloseTo(5 / 6, 10);
  });

  it('accepts a phrase whose other words are exact', () => {
    const result = gradePhrase('μεγάλο σπιτια', 'μεγάλο σπίτι');
    expect(result.accepted).toBe(true);
    expect(result.similarity).toBeCloseTo(0.95, 10);
  });

  it('does not let one exact word rescue wrong content', () => {
    const result = gradePhrase('μεγάλο αυτοκίνητο', 'μεγάλο σπίτι');
    expect(result.accepted).toBe(false);
    expect(result.similarity).toBeLessThan(GRADING_THRESHOLDS.contentReject);
  });

  it('compares article-only answers exactly', () => {
    expect(gradePhrase('τα', 'το')).toEqual({ accepted: false, similarity: 0.5 });
  });

  it('rejects empty answers', () => {
    expect(gradePhrase('', 'οτιδηποτε')).toEqual({ accepted: false, similarity: 0 });
    expect(gradePhrase('   ', 'οτιδηποτε')).toEqual({ accepted: false, similarity: 0 });
  });

  it('rejects any answer to an empty reference', () => {
    expect(gradePhrase('κάτι', '')).toEqual({ accepted: false, similarity: 0 });
  });

  it('never accepts below the acceptance bar', () => {
    const pairs: Array<[string, string]> = [
      ['ο φίλος', 'ο φίλος'],
      ['η φίλος', 'ο φίλος'],
      ['οι φίλοι', 'ο φίλος'],
      ['το σπίτι', 'το σπιτι'],
      ['μεγάλο σπιτια', 'μεγάλο σπίτι'],
      ['καλός', 'κακός'],
      ['ο', 'ο φίλος'],
      ['φίλος', 'ο φίλος'],
      ['Η μητέρα', 'η μητερα'],
      ['21', 'είκοσι ένα'],
    ];
    for (const [candidate, reference] of pairs) {
      const { accepted, similarity } = gradePhrase(candidate, reference);
      if (accepted) {
        expect(similarity).toBeGreaterThanOrEqual(GRADING_THRESHOLDS.phraseAccept);
      }
    }
  });
});

describe('gradeTextDetailed', () => {
  it('accepts an identical sentence', () => {
    const text = 'Η μητέρα διαβάζει το βιβλίο.';
    expect(gradeTextDetailed(text, text)).toEqual({ accepted: true, similarity: 1, mistakes: [] });
  });

  it('scores an unrelated sentence at zero', () => {
    const result = gradeTextDetailed('ψωμί νερό', 'σκύλος γάτα');
    expect(result.accepted).toBe(false);
    expect(result.similarity).toBe(0);
    expect(result.mistakes).toHaveLength(4);
  });

  it('accepts a sentence that differs only in [i] spellings', () => {
    expect(gradeTextDetailed('οι φίλη μου', 'οι φίλοι μου')).toEqual({
      accepted: true,
      similarity: 0.98,
      mistakes: [],
    });
  });

  it('fails a sentence with one wrong word form', () => {
    const result = gradeTextDetailed('εγώ βλέπω τον φίλη', 'Εγώ βλέπω τον φίλο.');

    expect(result.accepted).toBe(false);
    expect(result.similarity).toBe(0.75);
    expect(result.mistakes).toEqual([
      { position: 3, recognized: 'φιλη', correct: 'φιλο', similarity: 0.65 },
    ]);
  });

  it('reports a dropped word', () => {
    const result = gradeTextDetailed('η μητέρα το βιβλίο', 'η μητέρα διαβάζει το βιβλίο');

    expect(result.accepted).toBe(false);
    expect(result.mistakes).toEqual([
      { position: 2, recognized: null, correct: 'διαβαζει', similarity: 0 },
    ]);
  });

  it('reports an extra word', () => {
    const result = gradeTextDetailed('εγώ βλέπω καφέ', 'εγώ βλέπω');

    expect(result.accepted).toBe(false);
    expect(result.mistakes).toEqual([
      { position: 2, recognized: 'καφε', correct: null, similarity: 0 },
    ]);
  });

  it('rejects empty answers', () => {
    expect(gradeTextDetailed('', 'x')).toEqual({ accepted: false, similarity: 0, mistakes: [] });
  });

  it('only accepts with no mistakes and enough similarity', () => {
    const pairs: Array<[string, string]> = [
      ['εγώ βλέπω τον φίλο', 'εγώ βλέπω τον φίλο'],
      ['εγώ βλέπω τον φίλη', 'εγώ βλέπω τον φίλο'],
      ['εγω βλεπω', 'εγώ βλέπω τον φίλο'],
      ['η μητέρα διαβάζει', 'η μητέρα διαβάζει το βιβλίο'],
    ];
    for (const [candidate, reference] of pairs) {
      const { accepted, similarity, mistakes } = gradeTextDetailed(candidate, reference);
      if (accepted) {
        expect(similarity).toBeGreaterThanOrEqual(GRADING_THRESHOLDS.textAccept);
        expect(mistakes).toEqual([]);
      }
    }
  });
});
