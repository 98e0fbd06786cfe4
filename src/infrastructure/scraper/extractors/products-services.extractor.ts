import { FieldExtractor, NamedStrategy } from '../strategy';
import { findHeadings, findMarked, findNext, textOf } from '../dom';

const SERVICE_CONTAINER_PATTERN = /service|product|solution|feature|offering|capability|what-we-do/i;
const SERVICE_HEADING_PATTERN = /service|product|solution|offering|capability|what we do/i;
const MENU_PATTERN = /nav|menu|main-menu/i;
const MENU_LINK_PATTERN = /service|solution|offering|capability|industry/;

/** Largo máximo (exclusivo) de un item */
export const MAX_SERVICE_LENGTH = 100;

/** Largo máximo (exclusivo) de un item sacado del menú */
export const MAX_MENU_SERVICE_LENGTH = 50;

/** Si hay menos que esto, se mira el menú de navegación */
const MENU_FALLBACK_THRESHOLD = 3;

const shorterThan = (max: number) => (item: string) => item.length > 0 && item.length < max;

/** (a) headings dentro de secciones service/product/solution/... */
const fromServiceSections: NamedStrategy<string[]> = {
  name: 'service-sections',
  run: ({ $ }) =>
    findMarked($, ['div', 'section', 'article', 'ul'], SERVICE_CONTAINER_PATTERN)
      .flatMap((section) => $(section).find('h1, h2, h3, h4, h5').toArray())
      .map((heading) => textOf($, heading))
      .filter(shorterThan(MAX_SERVICE_LENGTH)),
};

/** (b) items de la primera lista después de un heading "Services" / "Products" / ... */
const fromHeadingLists: NamedStrategy<string[]> = {
  name: 'heading-lists',
  run: ({ $ }) =>
    findHeadings($, ['h1', 'h2', 'h3'], SERVICE_HEADING_PATTERN)
      .flatMap((heading) => {
        const list = findNext($, heading, ['ul', 'ol']);
        return list ? $(list).find('li').toArray() : [];
      })
      .map((item) => textOf($, item))
      .filter(shorterThan(MAX_SERVICE_LENGTH)),
};

/** (c) links del menú que hablan de servicios/soluciones */
const fromNavigationMenu: NamedStrategy<string[]> = {
  name: 'navigation-menu',
  run: ({ $ }) =>
    findMarked($, ['nav', 'ul'], MENU_PATTERN)
      .flatMap((menu) => $(menu).find('a').toArray())
      .map((link) => textOf($, link))
      .filter((text) => MENU_LINK_PATTERN.test(text.toLowerCase()))
      .filter(shorterThan(MAX_MENU_SERVICE_LENGTH)),
};

/**
 * Estrategia + condición para correrla. Todas las que aplican suman al perfil;
 * la condición mira lo acumulado hasta ese momento (también de páginas previas).
 */
export const PRODUCTS_SERVICES_STRATEGIES: ReadonlyArray<{
  strategy: NamedStrategy<string[]>;
  applies: (collected: readonly string[]) => boolean;
}> = [
  { strategy: fromServiceSections, applies: () => true },
  { strategy: fromHeadingLists, applies: (collected) => collected.length < 1 },
  { strategy: fromNavigationMenu, applies: (collected) => collected.length < MENU_FALLBACK_THRESHOLD },
];

export const productsServicesExtractor: FieldExtractor = {
  field: 'productsServices',
  extract(page, profile) {
    for (const { strategy, applies } of PRODUCTS_SERVICES_STRATEGIES) {
      if (!applies(profile.productsServices)) continue;
      for (const item of strategy.run(page, profile) ?? []) {
        profile.append('productsServices', item);
      }
    }
  },
};
