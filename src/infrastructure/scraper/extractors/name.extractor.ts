import { FieldExtractor, NamedStrategy, firstAccepted, isNonEmpty } from '../strategy';
import { cleanText, findMarked, textOf } from '../dom';

/** 1. alt del logo, sin la palabra "logo" ("Acme logo" → "Acme") */
const fromLogoAlt: NamedStrategy<string> = {
  name: 'logo-alt',
  run: ({ $ }) => {
    const logo = $('img[alt]')
      .toArray()
      .find((img) => /logo/i.test(img.attribs.alt));
    if (!logo) return null;
    return cleanText(logo.attribs.alt.replace(/logo/g, '').replace(/Logo/g, ''));
  },
};

/** 2. <title> hasta el primer "|" o "-" */
const fromTitle: NamedStrategy<string> = {
  name: 'title',
  run: ({ $ }) => {
    const title = $('title').first().text();
    if (!title) return null;
    return cleanText(title.split('|')[0].split('-')[0]);
  },
};

/** 3. Marca dentro del header / navbar */
const fromHeaderBrand: NamedStrategy<string> = {
  name: 'header-brand',
  run: ({ $ }) => {
    const headers = [
      ...$('header, nav').toArray(),
      ...findMarked($, ['div'], /header|navbar/i),
    ];
    for (const header of headers) {
      const brand = $(header)
        .find('a, div, span')
        .toArray()
        .find((el) => /brand|logo-text|site-title/i.test(el.attribs.class ?? ''));
      const text = brand ? textOf($, brand) : '';
      if (text) return text;
    }
    return null;
  },
};

export const NAME_STRATEGIES: readonly NamedStrategy<string>[] = [fromLogoAlt, fromTitle, fromHeaderBrand];

export const nameExtractor: FieldExtractor = {
  field: 'name',
  extract(page, profile) {
    if (profile.name) return;
    const found = firstAccepted(NAME_STRATEGIES, page, profile, isNonEmpty);
    if (found) profile.fill('name', found.value);
  },
};
