import { FieldExtractor, NamedStrategy } from '../strategy';
import { findHeadings, findMarked, findNext, textOf } from '../dom';
import { VALUE_KEYWORDS } from '../../../shared/constants/keyword-tables';

const VALUES_CONTAINER_PATTERN = /values|mission|vision|principles|purpose|culture/i;
const VALUES_HEADING_PATTERN = /values|mission|vision|principles|purpose/i;

/** Largo máximo (exclusivo) de un valor sacado del marcado */
const MAX_MARKUP_VALUE_LENGTH = 50;

/** Largo máximo (exclusivo) de una oración del about */
const MAX_SENTENCE_LENGTH = 150;

/** Largo máximo (exclusivo) de un valor ya refinado */
export const MAX_VALUE_LENGTH = 100;

export const MAX_VALUES = 5;

const SENTENCE_SPLIT = /[.!?]\s+/;
const PHRASE_SPLIT = /[,;]\s+/;

const hasValueKeyword = (text: string): boolean => {
  const lower = text.toLowerCase();
  return VALUE_KEYWORDS.some((keyword) => lower.includes(keyword));
};

/** (a) headings, negritas e items del primer bloque values/mission/vision/... */
const fromValuesSection: NamedStrategy<string[]> = {
  name: 'values-section',
  run: ({ $ }) => {
    const [section] = findMarked($, ['div', 'section', 'article'], VALUES_CONTAINER_PATTERN);
    if (!section) return null;
    return $(section)
      .find('h3, h4, h5, strong, b, li')
      .toArray()
      .map((item) => textOf($, item))
      .filter((value) => value.length > 0 && value.length < MAX_MARKUP_VALUE_LENGTH);
  },
};

/** (b) lista o párrafo que sigue a un heading "Our values" / "Mission" / ... */
const fromValuesHeadings: NamedStrategy<string[]> = {
  name: 'values-headings',
  run: ({ $ }) =>
    findHeadings($, ['h1', 'h2', 'h3', 'h4'], VALUES_HEADING_PATTERN).flatMap((heading) => {
      const next = findNext($, heading, ['ul', 'ol', 'p']);
      if (!next) return [];
      if (next.name === 'p') {
        const text = textOf($, next);
        return text ? [text] : [];
      }
      return $(next)
        .find('li')
        .toArray()
        .map((item) => textOf($, item))
        .filter((value) => value.length > 0 && value.length < MAX_MARKUP_VALUE_LENGTH);
    }),
};

/** (c) por cada keyword de valores, la primera oración del about que la contiene */
const fromAboutSentences: NamedStrategy<string[]> = {
  name: 'about-sentences',
  run: (_page, { about }) => {
    if (!about) return null;
    const lowerAbout = about.toLowerCase();
    const sentences = about.split(SENTENCE_SPLIT);
    const found: string[] = [];

    for (const keyword of VALUE_KEYWORDS) {
      if (!lowerAbout.includes(keyword)) continue;
      const sentence = sentences.find(
        (s) => s.toLowerCase().includes(keyword) && s.trim().length < MAX_SENTENCE_LENGTH,
      );
      if (sentence) found.push(sentence.trim());
    }
    return found;
  },
};

/** (d) frases de la descripción (cortada por , y ;) que mencionan un valor */
const fromDescriptionPhrases: NamedStrategy<string[]> = {
  name: 'description-phrases',
  run: (_page, { description }) => {
    if (!description) return null;
    return description
      .split(PHRASE_SPLIT)
      .filter((phrase) => phrase.length < MAX_VALUE_LENGTH && hasValueKeyword(phrase))
      .map((phrase) => phrase.trim());
  },
};

/**
 * La primera estrategia corre siempre; las demás solo si todavía no hay valores.
 */
export const VALUES_STRATEGIES: readonly NamedStrategy<string[]>[] = [
  fromValuesSection,
  fromValuesHeadings,
  fromAboutSentences,
  fromDescriptionPhrases,
];

/**
 * Los valores de más de 100 caracteres se parten en frases;
 * el resultado queda sin duplicados y con a lo sumo 5 entradas.
 */
export function refineValues(values: readonly string[]): string[] {
  const refined: string[] = [];
  const push = (value: string) => {
    if (value && !refined.includes(value)) refined.push(value);
  };

  for (const value of values) {
    if (value.length <= MAX_VALUE_LENGTH) {
      push(value);
      continue;
    }
    value
      .split(PHRASE_SPLIT)
      .map((part) => part.trim())
      .filter((part) => part.length < MAX_VALUE_LENGTH)
      .forEach(push);
  }

  return refined.slice(0, MAX_VALUES);
}

export const valuesExtractor: FieldExtractor = {
  field: 'values',
  extract(page, profile) {
    for (const [index, strategy] of VALUES_STRATEGIES.entries()) {
      if (index > 0 && profile.values.length > 0) break;
      for (const value of strategy.run(page, profile) ?? []) {
        profile.append('values', value);
      }
    }

    if (profile.values.length > 0) {
      profile.values = refineValues(profile.values);
    }
  },
};
