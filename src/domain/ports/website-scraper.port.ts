import { CompanyProfile } from '../entities/company-profile.entity';

/**
 * Token de inyección para los adaptadores de scraping.
 */
export const WEBSITE_SCRAPER_PORT = 'WEBSITE_SCRAPER_PORT';

/**
 * Puerto (interfaz) para extraer el perfil de una empresa desde su web.
 * Parte del dominio — no conoce frameworks ni infraestructura.
 *
 * Contrato best-effort: nunca rechaza. Ante cualquier fallo devuelve el perfil
 * parcial acumulado hasta ese momento (posiblemente vacío).
 */
export interface WebsiteScraperPort {
  /**
   * @param url URL base de la empresa (con esquema y host)
   * @param options Opciones de extracción
   */
  scrape(url: string, options?: ScrapeOptions): Promise<CompanyProfile>;
}

export interface ScrapeOptions {
  /** Nombre conocido de la empresa. Si viene, se saltea la extracción del nombre. */
  companyName?: string;
}
