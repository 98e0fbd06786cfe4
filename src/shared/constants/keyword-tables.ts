import industryKeywordsData from './industry-keywords.json';

export interface IndustryKeywords {
  industry: string;
  keywords: readonly string[];
}

/**
 * Categorías de industria con sus keywords.
 * El orden del array es la prioridad de desempate al inferir la industria.
 */
export const INDUSTRY_KEYWORDS: readonly IndustryKeywords[] = industryKeywordsData;

/** Palabras que delatan un valor corporativo dentro de un texto libre */
export const VALUE_KEYWORDS: readonly string[] = [
  'integrity', 'innovation', 'excellence', 'quality', 'customer', 'service',
  'respect', 'responsibility', 'sustainability', 'diversity', 'inclusion',
  'teamwork', 'collaboration', 'trust', 'ethical', 'commitment', 'passion',
];

/** Items de menú que no son productos ni servicios (match exacto, en minúsculas) */
export const NAVIGATION_ITEMS: readonly string[] = [
  'home', 'about', 'about us', 'contact', 'contact us', 'careers',
  'login', 'sign in', 'register', 'blog', 'news', 'events',
  'privacy policy', 'terms', 'sitemap', 'search', 'locations',
];

/** Substrings que descartan un item de productos/servicios */
export const NAVIGATION_SUBSTRINGS: readonly string[] = ['login', 'sign', 'contact', 'about'];

/** Productos/servicios por defecto según industria */
export const DEFAULT_SERVICES_BY_INDUSTRY: Readonly<Record<string, readonly string[]>> = {
  Technology: ['Software Development', 'Cloud Solutions', 'Digital Transformation'],
  Healthcare: ['Patient Care', 'Medical Services', 'Healthcare Solutions'],
  Finance: ['Financial Services', 'Investment Management', 'Banking Solutions'],
  'Professional Services': ['Consulting', 'Advisory Services', 'Business Solutions'],
  Consulting: ['Strategy Consulting', 'Management Consulting', 'Business Advisory'],
};

/** Fallback para industrias sin lista propia */
export const genericServicesFor = (industry: string): string[] => [
  `${industry} Services`,
  'Consulting',
  'Professional Solutions',
];

/** Valores por defecto según industria */
export const DEFAULT_VALUES_BY_INDUSTRY: Readonly<Record<string, readonly string[]>> = {
  Technology: ['Innovation', 'Excellence', 'Customer-Centric'],
  Healthcare: ['Patient-Focused', 'Quality Care', 'Compassion'],
  Finance: ['Integrity', 'Trust', 'Excellence'],
  'Professional Services': ['Client Success', 'Excellence', 'Integrity'],
  Consulting: ['Client Value', 'Expertise', 'Collaboration'],
};

export const GENERIC_VALUES: readonly string[] = ['Excellence', 'Integrity', 'Client Focus'];
