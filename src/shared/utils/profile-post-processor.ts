import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import {
  DEFAULT_SERVICES_BY_INDUSTRY,
  DEFAULT_VALUES_BY_INDUSTRY,
  GENERIC_VALUES,
  NAVIGATION_ITEMS,
  NAVIGATION_SUBSTRINGS,
  genericServicesFor,
} from '../constants/keyword-tables';
import { digitsOf, extractDomain } from './url';

export const CONTACT_SEPARATOR = ' | ';

/** Un teléfono necesita al menos 7 dígitos (menos suele ser una fecha) */
export const MIN_PHONE_DIGITS = 7;

const MIN_SERVICE_LENGTH = 4;

/** "March 3, 2024", "Jan 15 2023" */
const DATE_VALUE_PATTERN =
  /^\s*(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\s+\d{1,2},?\s+\d{4}\s*$/i;

/**
 * Descarta items de menú que se colaron como productos/servicios.
 * Si el filtro vaciaría la lista, se devuelve la original.
 */
export function filterNavigationItems(items: readonly string[]): string[] {
  const filtered = items.filter((item) => {
    const lower = item.toLowerCase();
    if (NAVIGATION_ITEMS.includes(lower)) return false;
    if (item.length < MIN_SERVICE_LENGTH) return false;
    return !NAVIGATION_SUBSTRINGS.some((term) => lower.includes(term));
  });

  return filtered.length > 0 ? filtered : [...items];
}

/** Saca los valores que en realidad son fechas */
export function filterDateValues(values: readonly string[]): string[] {
  return values.filter((value) => !DATE_VALUE_PATTERN.test(value));
}

/**
 * Quita los fragmentos "Phone:" con menos de 7 dígitos.
 * Si no queda ningún fragmento, devuelve "".
 */
export function validateContactPhones(contact: string): string {
  if (!contact.includes('Phone:')) return contact;

  const kept = contact
    .split(CONTACT_SEPARATOR)
    .filter((part) => !part.startsWith('Phone:') || digitsOf(part).length >= MIN_PHONE_DIGITS);

  return kept.join(CONTACT_SEPARATOR);
}

/** Contacto mínimo armado desde el dominio: LinkedIn probable + la propia web */
export function buildFallbackContact(baseUrl: string): string {
  const slug = extractDomain(baseUrl).split('.')[0];
  return [`LinkedIn: https://www.linkedin.com/company/${slug}`, `Website: ${baseUrl}`].join(
    CONTACT_SEPARATOR,
  );
}

export function defaultServicesFor(industry: string): string[] {
  const known = DEFAULT_SERVICES_BY_INDUSTRY[industry];
  return known ? [...known] : genericServicesFor(industry);
}

export function defaultValuesFor(industry: string): string[] {
  const known = DEFAULT_VALUES_BY_INDUSTRY[industry];
  return [...(known ?? GENERIC_VALUES)];
}

/**
 * Limpieza final del perfil, en este orden:
 * 1. productos/servicios sin items de navegación
 * 2. valores sin fechas
 * 3. teléfonos con menos de 7 dígitos fuera del contacto
 * 4. contacto vacío → LinkedIn + web desde el dominio
 * 5. productos/servicios vacíos → defaults de la industria
 * 6. valores vacíos → defaults de la industria
 */
export function postProcessProfile(profile: CompanyProfile, baseUrl: string): CompanyProfile {
  if (profile.productsServices.length > 0) {
    profile.productsServices = filterNavigationItems(profile.productsServices);
  }

  if (profile.values.length > 0) {
    profile.values = filterDateValues(profile.values);
  }

  if (profile.contact) {
    profile.contact = validateContactPhones(profile.contact);
  }

  if (!profile.contact) {
    profile.contact = buildFallbackContact(baseUrl);
  }

  if (profile.productsServices.length === 0 && profile.industry) {
    profile.productsServices = defaultServicesFor(profile.industry);
  }

  if (profile.values.length === 0 && profile.industry) {
    profile.values = defaultValuesFor(profile.industry);
  }

  return profile;
}
