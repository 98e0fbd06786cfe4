import { Logger } from '@nestjs/common';
import { FieldExtractor, NamedStrategy, PageContext } from '../strategy';
import { findHeadings, findMarked, findNext, metaContent, textOf } from '../dom';

const logger = new Logger('AboutExtractor');

const ABOUT_CONTAINER_PATTERN = /content|main|about|company|overview|who-we-are/i;
const ABOUT_HEADING_PATTERN = /about us|company|who we are/i;
const ABOUT_PAGE_URL_PATTERN = /about|company|who-we-are/i;
const ABOUT_PAGE_TITLE_PATTERN = /about|company|who we are/i;

/** Un candidato con más de esto se considera contenido suficiente */
export const SUBSTANTIAL_ABOUT_LENGTH = 50;

/** Menos de esto no se guarda */
export const MIN_ABOUT_LENGTH = 20;

/** Párrafos que se toman de cada contenedor */
const PARAGRAPHS_PER_CONTAINER = 3;

/**
 * Devuelve el primer candidato con contenido suficiente; si ninguno lo tiene,
 * el último no vacío (puede servir igual si pasa el mínimo final).
 */
function pickSubstantial(candidates: Iterable<string>): string | null {
  let last: string | null = null;
  for (const candidate of candidates) {
    if (!candidate) continue;
    if (candidate.length > SUBSTANTIAL_ABOUT_LENGTH) return candidate;
    last = candidate;
  }
  return last;
}

/** (a) hasta 3 párrafos de un contenedor content/about/company/overview */
const fromContentContainers: NamedStrategy<string> = {
  name: 'content-container',
  run: ({ $ }) =>
    pickSubstantial(
      findMarked($, ['main', 'div', 'section', 'article'], ABOUT_CONTAINER_PATTERN).map((container) =>
        $(container)
          .find('p')
          .toArray()
          .slice(0, PARAGRAPHS_PER_CONTAINER)
          .map((p) => textOf($, p))
          .join(' ')
          .trim(),
      ),
    ),
};

const fromMetaDescription: NamedStrategy<string> = {
  name: 'meta-description',
  run: ({ $ }) => metaContent($, 'name', 'description') || null,
};

const fromOpenGraph: NamedStrategy<string> = {
  name: 'og-description',
  run: ({ $ }) => metaContent($, 'property', 'og:description') || null,
};

/** (d) párrafo siguiente a un heading "About us" / "Company" / "Who we are" */
const fromAboutHeading: NamedStrategy<string> = {
  name: 'about-heading',
  run: ({ $ }) =>
    pickSubstantial(
      findHeadings($, ['h1', 'h2', 'h3'], ABOUT_HEADING_PATTERN).map((heading) => {
        const paragraph = findNext($, heading, ['p']);
        return paragraph ? textOf($, paragraph) : '';
      }),
    ),
};

export const ABOUT_STRATEGIES: readonly NamedStrategy<string>[] = [
  fromContentContainers,
  fromMetaDescription,
  fromOpenGraph,
  fromAboutHeading,
];

export function isAboutPage({ $, url }: PageContext): boolean {
  return ABOUT_PAGE_URL_PATTERN.test(url) || ABOUT_PAGE_TITLE_PATTERN.test($('title').first().text());
}

/**
 * A diferencia del resto de campos, cada estrategia reemplaza al candidato
 * anterior mientras éste no llegue a contenido suficiente; recién al final se
 * exige el mínimo.
 */
export const aboutExtractor: FieldExtractor = {
  field: 'about',
  extract(page, profile) {
    if (profile.about) return;

    let candidate = '';
    let source = '';
    for (const strategy of ABOUT_STRATEGIES) {
      if (candidate.length >= SUBSTANTIAL_ABOUT_LENGTH) break;
      const found = strategy.run(page, profile);
      if (found) {
        candidate = found;
        source = strategy.name;
      }
    }

    if (candidate.length > MIN_ABOUT_LENGTH && profile.fill('about', candidate)) {
      logger.debug(`   about via ${source}${isAboutPage(page) ? ' (página about)' : ''}: ${page.url}`);
    }
  },
};
