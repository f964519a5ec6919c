import { describe, expect, it } from 'vitest';
import { normalize, removeAccents, substituteNumeral } from '../services/grading/normalize.js';
import { canonicalizeForMatching, isArticle } from '../services/grading/phonetic.js';

describe('normalize', () => {
  it('lowercases, strips punctuation and accents, collapses spaces', () => {
    expect(normalize('  Καλημέρα,  κόσμε! ')).toBe('καλημερα κοσμε');
    expect(normalize('(Ναι;)')).toBe('ναι');
    expect(normalize('Ώρα: δύο.')).toBe('ωρα δυο');
  });

  it('spells a bare numeral', () => {
    expect(normalize('15')).toBe('δεκαπεντε');
    expect(normalize(' 21 ')).toBe('εικοσι ενα');
  });

  it('spells a numeral that carries punctuation', () => {
    expect(normalize('15.')).toBe('δεκαπεντε');
    expect(normalize('(21)')).toBe('εικοσι ενα');
  });

  it('keeps digits it cannot spell', () => {
    expect(normalize('1500')).toBe('1500');
    expect(normalize('δύο 2')).toBe('δυο 2');
  });

  it('returns an empty string for empty input', () => {
    expect(normalize('')).toBe('');
    expect(normalize('  ?! ')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'Η μητέρα διαβάζει το βιβλίο.',
      'ΦΊΛΟΣ',
      '15',
      '15.',
      '(21)',
      '1500',
      'Τι κάνεις;   Καλά!',
      'προϊόν, Αΐδης',
      '',
    ];
    for (const sample of samples) {
      expect(normalize(normalize(sample))).toBe(normalize(sample));
    }
  });
});

describe('removeAccents', () => {
  it('maps accented capitals to bare lowercase vowels', () => {
    expect(removeAccents('Άλφα')).toBe('αλφα');
  });

  it('strips the diaeresis', () => {
    expect(removeAccents('προϊόν')).toBe('προιον');
    expect(removeAccents('ΐ')).toBe('ι');
  });

  it('handles the polytonic oxia code point', () => {
    expect(removeAccents('\u1F71')).toBe('α');
  });
});

describe('substituteNumeral', () => {
  it('only replaces whole-digit input', () => {
    expect(substituteNumeral('3')).toBe('τρία');
    expect(substituteNumeral('3 γάτες')).toBe('3 γάτες');
    expect(substituteNumeral('2000')).toBe('2000');
  });
});

describe('canonicalizeForMatching', () => {
  it('folds every spelling of the [i] sound', () => {
    expect(canonicalizeForMatching('η μητερα διαβαζει')).toBe('η μιτερα διαβαζι');
    expect(canonicalizeForMatching('υιος')).toBe('ιος');
  });

  it('leaves articles untouched', () => {
    expect(canonicalizeForMatching('οι φιλοι')).toBe('οι φιλι');
    expect(canonicalizeForMatching('της γης')).toBe('της γις');
  });

  it('rejoins words with single spaces', () => {
    expect(canonicalizeForMatching(' το  σπιτι ')).toBe('το σπιτι');
    expect(canonicalizeForMatching('')).toBe('');
  });
});

describe('isArticle', () => {
  it('knows the closed set', () => {
    expect(isArticle('των')).toBe(true);
    expect(isArticle('τον')).toBe(false);
  });
});
