/**
 * Greek text normalization for answer comparison
 * - Remove punctuation
 * - Lowercase
 * - Collapse multiple spaces
 * - Spell a bare numeral ("15." from the recognizer included)
 * - Remove accents/diacritics
 */
import { numberToGreek } from './numerals.js';

const PUNCTUATION = /[.,!?;:()]/g;

// Accented vowels (and their capitals) mapped to the bare lowercase vowel
const ACCENT_MAP: Readonly<Record<string, string>> = Object.freeze({
  'ά': 'α', 'έ': 'ε', 'ή': 'η', 'ί': 'ι', 'ό': 'ο', 'ύ': 'υ', 'ώ': 'ω',
  'Ά': 'α', 'Έ': 'ε', 'Ή': 'η', 'Ί': 'ι', 'Ό': 'ο', 'Ύ': 'υ', 'Ώ': 'ω',
  'ϊ': 'ι', 'ΐ': 'ι', 'ϋ': 'υ', 'ΰ': 'υ',
});

const ACCENTED = new RegExp(`[${Object.keys(ACCENT_MAP).join('')}]`, 'g');

/**
 * Strip Greek accents and diaeresis. Everything else is left as is.
 */
export function removeAccents(text: string): string {
  if (!text) return '';

  // NFC folds the polytonic "oxia" code points onto the monotonic ones in the map
  return text.normalize('NFC').replace(ACCENTED, (ch) => ACCENT_MAP[ch] ?? ch);
}

/**
 * Replace a text that is only digits with its spelled-out Greek numeral.
 * Unsupported values are returned unchanged.
 */
export function substituteNumeral(text: string): string {
  const stripped = text.trim();
  if (!/^[0-9]+$/.test(stripped)) return text;

  return numberToGreek(stripped) ?? text;
}

/**
 * Normalize Greek text for comparison. Never throws; empty input gives "".
 */
export function normalize(text: string): string {
  if (!text) return '';

  const collapsed = text
    .replace(PUNCTUATION, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();

  return removeAccents(substituteNumeral(collapsed));
}
