/**
 * Text matching and ranking for memory search.
 *
 * Mirrors what the Postgres repository asks of the database (unaccent + ILIKE for
 * substring containment, to_tsvector/plainto_tsquery/ts_rank for full text) so the
 * in-memory store ranks the same way without a text-search engine.
 */

import stopwords from '../../config/stopwords.json';
import { TextSearchLanguage } from '../../config/environment';

type SuffixRule = readonly [suffix: string, replacement: string];

const MIN_STEM_LENGTH = 3;

// Ordered longest-first within each family; the first rule that fits wins
const SUFFIX_RULES: Record<Exclude<TextSearchLanguage, 'simple'>, readonly SuffixRule[]> = {
  spanish: [
    ['amientos', ''], ['imientos', ''], ['amiento', ''], ['imiento', ''],
    ['aciones', ''], ['uciones', ''], ['idades', ''], ['adoras', ''], ['adores', ''],
    ['ancias', ''], ['mente', ''], ['acion', ''], ['ucion', ''], ['adora', ''],
    ['ancia', ''], ['ables', ''], ['ibles', ''], ['istas', ''], ['iendo', ''],
    ['ieron', ''], ['idad', ''], ['ador', ''], ['able', ''], ['ible', ''],
    ['ista', ''], ['ando', ''], ['aron', ''], ['osos', ''], ['osas', ''],
    ['oso', ''], ['osa', ''], ['ar', ''], ['er', ''], ['ir', ''],
    ['es', ''], ['as', ''], ['os', ''], ['a', ''], ['o', ''], ['e', ''], ['s', '']
  ],
  english: [
    ['izations', 'ize'], ['ization', 'ize'], ['ational', 'ate'], ['fulness', 'ful'],
    ['iveness', 'ive'], ['ousness', 'ous'], ['ations', 'ate'], ['ation', 'ate'],
    ['ments', ''], ['ment', ''], ['ness', ''], ['ings', ''], ['ing', ''],
    ['edly', ''], ['sses', 'ss'], ['ches', 'ch'], ['shes', 'sh'], ['xes', 'x'],
    ['ies', 'y'], ['ied', 'y'], ['ers', ''], ['er', ''], ['ed', ''], ['ly', ''],
    ['ss', 'ss'], ['s', '']
  ]
};

const STOP_WORDS: Record<Exclude<TextSearchLanguage, 'simple'>, ReadonlySet<string>> = {
  spanish: new Set(stopwords.spanish),
  english: new Set(stopwords.english)
};

/**
 * Lower-cases and strips diacritics ("Canción" -> "cancion").
 */
export function normalizeText(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 0);
}

export function stem(token: string, language: TextSearchLanguage): string {
  if (language === 'simple') {
    return token;
  }
  for (const [suffix, replacement] of SUFFIX_RULES[language]) {
    if (token.endsWith(suffix) && token.length - suffix.length >= MIN_STEM_LENGTH) {
      return token.slice(0, token.length - suffix.length) + replacement;
    }
  }
  return token;
}

/**
 * Tokens with stop words removed and stemmed, in document order.
 */
export function toLexemes(text: string, language: TextSearchLanguage): string[] {
  const stops = language === 'simple' ? undefined : STOP_WORDS[language];
  return tokenize(text)
    .filter(token => !stops?.has(token))
    .map(token => stem(token, language));
}

/**
 * Literal, case- and accent-insensitive containment.
 */
export function containsText(haystack: string, needle: string): boolean {
  return normalizeText(haystack).includes(normalizeText(needle));
}

/**
 * Full-text rank of a document against a query. Every query lexeme must be present;
 * a query without lexemes never matches. Returns 0 when there is no match.
 */
export function fullTextRank(document: string, queryText: string, language: TextSearchLanguage): number {
  const queryLexemes = new Set(toLexemes(queryText, language));
  if (queryLexemes.size === 0) {
    return 0;
  }

  const documentLexemes = toLexemes(document, language);
  if (documentLexemes.length === 0) {
    return 0;
  }

  const frequencies = new Map<string, number>();
  for (const lexeme of documentLexemes) {
    frequencies.set(lexeme, (frequencies.get(lexeme) ?? 0) + 1);
  }

  let total = 0;
  for (const lexeme of queryLexemes) {
    const frequency = frequencies.get(lexeme);
    if (!frequency) {
      return 0;
    }
    total += frequency;
  }

  return total / (1 + Math.log(documentLexemes.length));
}

export interface MatchScore {
  matched: boolean;
  rank: number;
}

export function scoreMemory(
  memory: { key: string; value: string },
  queryText: string,
  language: TextSearchLanguage
): MatchScore {
  const rank = fullTextRank(`${memory.key} ${memory.value}`, queryText, language);
  const matched = rank > 0 || containsText(memory.key, queryText) || containsText(memory.value, queryText);
  return { matched, rank };
}

export interface RankedCandidate {
  rank: number;
  relevance_score: number;
  created_at: Date;
  sequence: number;
}

/**
 * rank desc, relevance_score desc, created_at desc, then insertion order.
 */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  return (
    b.rank - a.rank ||
    b.relevance_score - a.relevance_score ||
    b.created_at.getTime() - a.created_at.getTime() ||
    a.sequence - b.sequence
  );
}
