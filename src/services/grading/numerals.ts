/**
 * Greek numeral speller
 * Turns a digit string into the spelled-out Greek numeral (0–1000)
 */

const UNITS_AND_TEENS: Record<number, string> = {
  0: 'μηδέν',
  1: 'ένα',
  2: 'δύο',
  3: 'τρία',
  4: 'τέσσερα',
  5: 'πέντε',
  6: 'έξι',
  7: 'επτά',
  8: 'οκτώ',
  9: 'εννέα',
  10: 'δέκα',
  11: 'έντεκα',
  12: 'δώδεκα',
  13: 'δεκατρία',
  14: 'δεκατέσσερα',
  15: 'δεκαπέντε',
  16: 'δεκαέξι',
  17: 'δεκαεπτά',
  18: 'δεκαοκτώ',
  19: 'δεκαεννέα',
  20: 'είκοσι',
};

const DECADES: Record<number, string> = {
  30: 'τριάντα',
  40: 'σαράντα',
  50: 'πενήντα',
  60: 'εξήντα',
  70: 'εβδομήντα',
  80: 'ογδόντα',
  90: 'ενενήντα',
};

const HUNDREDS: Record<number, string> = {
  100: 'εκατό',
  200: 'διακόσια',
  300: 'τριακόσια',
  400: 'τετρακόσια',
  500: 'πεντακόσια',
  600: 'εξακόσια',
  700: 'επτακόσια',
  800: 'οκτακόσια',
  900: 'εννιακόσια',
};

const THOUSAND = 'χίλια';

function spellBelowHundred(value: number): string | null {
  const direct = UNITS_AND_TEENS[value] ?? DECADES[value];
  if (direct) return direct;

  if (value < 21 || value > 99) return null;

  // The twenties are built on "είκοσι", not on a decade word
  const decade = value < 30 ? UNITS_AND_TEENS[20] : DECADES[Math.floor(value / 10) * 10];
  const unit = UNITS_AND_TEENS[value % 10];
  return decade && unit ? `${decade} ${unit}` : null;
}

/**
 * Spell a decimal digit string as a Greek numeral.
 * Returns null for anything that is not 0–1000, so callers keep the digits.
 */
export function numberToGreek(digits: string): string | null {
  const trimmed = digits.trim();
  if (!/^[0-9]+$/.test(trimmed)) return null;

  const value = parseInt(trimmed, 10);

  if (value === 1000) return THOUSAND;
  if (value < 100) return spellBelowHundred(value);
  if (value > 999) return null;

  const hundred = HUNDREDS[Math.floor(value / 100) * 100];
  if (!hundred) return null;

  const remainder = value % 100;
  if (remainder === 0) return hundred;

  const rest = spellBelowHundred(remainder);
  return rest ? `${hundred} ${rest}` : null;
}
