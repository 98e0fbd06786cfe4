import * as cheerio from 'cheerio';
import {
  CompanyProfile,
  ProfileListField,
  ProfileTextField,
} from '../../domain/entities/company-profile.entity';

/** Una página ya parseada */
export interface PageContext {
  url: string;
  $: cheerio.CheerioAPI;
}

/**
 * Una forma de detectar un campo. Devuelve null si no encontró nada.
 * No escribe en el perfil: solo lo lee para decidir.
 */
export type ExtractionStrategy<T> = (page: PageContext, profile: CompanyProfile) => T | null;

export interface NamedStrategy<T> {
  name: string;
  run: ExtractionStrategy<T>;
}

/**
 * Extractor de un campo. Recibe la página y el perfil en construcción y solo
 * escribe si el campo sigue vacío (texto) o agregando sin duplicar (listas).
 */
export interface FieldExtractor {
  readonly field: ProfileTextField | ProfileListField;
  extract(page: PageContext, profile: CompanyProfile): void;
}

/**
 * Prueba las estrategias en orden y devuelve el primer resultado aceptado.
 */
export function firstAccepted<T>(
  strategies: readonly NamedStrategy<T>[],
  page: PageContext,
  profile: CompanyProfile,
  accept: (value: T) => boolean,
): { value: T; strategy: string } | null {
  for (const strategy of strategies) {
    const value = strategy.run(page, profile);
    if (value !== null && accept(value)) {
      return { value, strategy: strategy.name };
    }
  }
  return null;
}

export const isNonEmpty = (value: string): boolean => value.length > 0;
