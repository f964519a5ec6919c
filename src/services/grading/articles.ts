/**
 * Explains why the articles of an answer do not match the expected ones
 */
import { tokenize } from './align.js';
import { normalize } from './normalize.js';
import { isArticle } from './phonetic.js';

type Gender = 'masculine' | 'feminine' | 'neuter' | 'any';
type GrammaticalNumber = 'singular' | 'plural';
type Case = 'nominative' | 'genitive';

interface ArticleInfo {
  gender: Gender;
  number: GrammaticalNumber;
  case: Case;
}

const ARTICLE_INFO: Readonly<Record<string, ArticleInfo>> = Object.freeze({
  'ο': { gender: 'masculine', number: 'singular', case: 'nominative' },
  'η': { gender: 'feminine', number: 'singular', case: 'nominative' },
  'το': { gender: 'neuter', number: 'singular', case: 'nominative' },
  'οι': { gender: 'masculine', number: 'plural', case: 'nominative' },
  'τα': { gender: 'neuter', number: 'plural', case: 'nominative' },
  'του': { gender: 'masculine', number: 'singular', case: 'genitive' },
  'της': { gender: 'feminine', number: 'singular', case: 'genitive' },
  'των': { gender: 'any', number: 'plural', case: 'genitive' },
});

export type ArticleMismatchKind = 'count' | 'missing' | 'number' | 'gender' | 'other';

export interface ArticleMismatch {
  kind: ArticleMismatchKind;
  message: string;
  recognized: string[];
  expected: string[];
}

function describe(info: ArticleInfo): string {
  const gender = info.gender === 'any' ? 'any gender' : info.gender;
  return `${gender}, ${info.number}, ${info.case}`;
}

/**
 * Compare the article sequences of two raw phrases.
 * Returns null when they are identical.
 */
export function describeArticleMismatch(candidate: string, reference: string): ArticleMismatch | null {
  const recognized = tokenize(normalize(candidate)).filter(isArticle);
  const expected = tokenize(normalize(reference)).filter(isArticle);

  if (recognized.length === expected.length && recognized.every((a, i) => a === expected[i])) {
    return null;
  }

  const result = (kind: ArticleMismatchKind, message: string): ArticleMismatch => ({
    kind,
    message,
    recognized,
    expected,
  });

  if (recognized.length === 0) {
    return result('missing', `Article missing: expected ${expected.join(' ')}`);
  }

  if (recognized.length !== expected.length) {
    return result(
      'count',
      `Article count differs: you used ${recognized.length}, expected ${expected.length}`
    );
  }

  if (recognized.length === 1) {
    const said = ARTICLE_INFO[recognized[0]];
    const wanted = ARTICLE_INFO[expected[0]];

    if (said && wanted) {
      if (said.number !== wanted.number) {
        return result(
          'number',
          said.number === 'plural'
            ? 'Plural article used instead of singular'
            : 'Singular article used instead of plural'
        );
      }
      if (said.gender !== wanted.gender || said.case !== wanted.case) {
        return result(
          'gender',
          `Wrong article: ${describe(said)} instead of ${describe(wanted)}`
        );
      }
    }
  }

  return result('other', 'Wrong article');
}
