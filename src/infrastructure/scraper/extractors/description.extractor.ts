import { FieldExtractor, NamedStrategy, firstAccepted, isNonEmpty } from '../strategy';
import { findMarked, metaContent, textOf } from '../dom';

const HERO_PATTERN = /hero|banner|jumbotron|intro/i;

const fromMetaDescription: NamedStrategy<string> = {
  name: 'meta-description',
  run: ({ $ }) => metaContent($, 'name', 'description') || null,
};

const fromOpenGraph: NamedStrategy<string> = {
  name: 'og-description',
  run: ({ $ }) => metaContent($, 'property', 'og:description') || null,
};

/** Primer párrafo del primer bloque hero/banner/intro */
const fromHeroParagraph: NamedStrategy<string> = {
  name: 'hero-paragraph',
  run: ({ $ }) => {
    const [hero] = findMarked($, ['div', 'section'], HERO_PATTERN);
    if (!hero) return null;
    const paragraph = $(hero).find('p').first().get(0);
    return paragraph ? textOf($, paragraph) : null;
  },
};

export const DESCRIPTION_STRATEGIES: readonly NamedStrategy<string>[] = [
  fromMetaDescription,
  fromOpenGraph,
  fromHeroParagraph,
];

export const descriptionExtractor: FieldExtractor = {
  field: 'description',
  extract(page, profile) {
    if (profile.description) return;
    const found = firstAccepted(DESCRIPTION_STRATEGIES, page, profile, isNonEmpty);
    if (found) profile.fill('description', found.value);
  },
};
