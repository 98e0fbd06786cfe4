import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import { INDUSTRY_KEYWORDS, IndustryKeywords } from '../constants/keyword-tables';

type IndustryCorpusSource = Pick<
  CompanyProfile,
  'name' | 'description' | 'about' | 'productsServices' | 'values'
>;

/** Tope de ocurrencias que suman por keyword (rendimiento decreciente) */
const MAX_OCCURRENCES_PER_KEYWORD = 3;

/** Bonus si la keyword aparece en el nombre o la descripción */
const NAME_OR_DESCRIPTION_BONUS = 2;

/**
 * Cuenta apariciones no solapadas de `needle` dentro de `haystack`.
 * Es match de substring, no de palabra: "it" cuenta dentro de "quality".
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/** Texto sobre el que se buscan keywords: todos los campos, en minúsculas */
export function buildIndustryCorpus(profile: IndustryCorpusSource): string {
  return [
    profile.name,
    profile.description,
    profile.about,
    profile.productsServices.join(' '),
    profile.values.join(' '),
  ]
    .join(' ')
    .toLowerCase();
}

/**
 * Puntaje por industria, en el orden de la tabla.
 *
 * Por cada keyword presente suma min(ocurrencias, 3), y +2 más si además está
 * en el nombre o la descripción (esas keywords cuentan dos veces a propósito).
 */
export function scoreIndustries(
  profile: IndustryCorpusSource,
  table: readonly IndustryKeywords[] = INDUSTRY_KEYWORDS,
): Map<string, number> {
  const corpus = buildIndustryCorpus(profile);
  const name = profile.name.toLowerCase();
  const description = profile.description.toLowerCase();
  const scores = new Map<string, number>();

  for (const { industry, keywords } of table) {
    let score = 0;
    for (const keyword of keywords) {
      const occurrences = countOccurrences(corpus, keyword);
      if (occurrences === 0) continue;

      score += Math.min(occurrences, MAX_OCCURRENCES_PER_KEYWORD);
      if (name.includes(keyword) || description.includes(keyword)) {
        score += NAME_OR_DESCRIPTION_BONUS;
      }
    }
    scores.set(industry, score);
  }

  return scores;
}

/**
 * Industria con el puntaje estrictamente más alto.
 * Empates: gana la que aparece primero en la tabla. Todo en 0 → "".
 */
export function inferIndustry(
  profile: IndustryCorpusSource,
  table: readonly IndustryKeywords[] = INDUSTRY_KEYWORDS,
): string {
  let best = '';
  let bestScore = 0;

  for (const [industry, score] of scoreIndustries(profile, table)) {
    if (score > bestScore) {
      best = industry;
      bestScore = score;
    }
  }

  return best;
}
