import { describe, expect, it } from 'vitest';
import { numberToGreek } from '../services/grading/numerals.js';

describe('numberToGreek', () => {
  it('spells the table values', () => {
    expect(numberToGreek('0')).toBe('μηδέν');
    expect(numberToGreek('15')).toBe('δεκαπέντε');
    expect(numberToGreek('20')).toBe('είκοσι');
    expect(numberToGreek('30')).toBe('τριάντα');
    expect(numberToGreek('100')).toBe('εκατό');
    expect(numberToGreek('1000')).toBe('χίλια');
  });

  it('builds the twenties on "είκοσι"', () => {
    expect(numberToGreek('21')).toBe('είκοσι ένα');
    expect(numberToGreek('29')).toBe('είκοσι εννέα');
  });

  it('combines decades and units', () => {
    expect(numberToGreek('47')).toBe('σαράντα επτά');
    expect(numberToGreek('99')).toBe('ενενήντα εννέα');
  });

  it('combines hundreds with the rest', () => {
    expect(numberToGreek('120')).toBe('εκατό είκοσι');
    expect(numberToGreek('125')).toBe('εκατό είκοσι πέντε');
    expect(numberToGreek('215')).toBe('διακόσια δεκαπέντε');
    expect(numberToGreek('345')).toBe('τριακόσια σαράντα πέντε');
    expect(numberToGreek('900')).toBe('εννιακόσια');
  });

  it('tolerates surrounding whitespace and leading zeros', () => {
    expect(numberToGreek(' 7 ')).toBe('επτά');
    expect(numberToGreek('007')).toBe('επτά');
  });

  it('returns null for unsupported values', () => {
    expect(numberToGreek('1500')).toBeNull();
    expect(numberToGreek('1001')).toBeNull();
    expect(numberToGreek('-5')).toBeNull();
    expect(numberToGreek('12a')).toBeNull();
    expect(numberToGreek('')).toBeNull();
  });
});
