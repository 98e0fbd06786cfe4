import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { WebsiteScraperPort, WEBSITE_SCRAPER_PORT } from '../../domain/ports/website-scraper.port';
import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import { ProfileCacheService } from './profile-cache.service';
import { extractDomain, isValidWebsiteUrl } from '../../shared/utils/url';

/**
 * Servicio que obtiene el perfil de una empresa desde su web.
 *
 * Flujo:
 *   1. getProfile("https://acme.io", "Acme")
 *   2. → ¿Está en cache para hoy? → copia del cacheado
 *   3. → Si no, scraper → CompanyProfile → cache
 *   4. → Si se pasó nombre, pisa el nombre de la copia devuelta
 *
 * Solo se cachea lo scrapeado sin nombre: el nombre de un caller no debe
 * llegarle a los siguientes.
 */
@Injectable()
export class CompanyProfileService {
  private readonly logger = new Logger(CompanyProfileService.name);

  constructor(
    @Inject(WEBSITE_SCRAPER_PORT)
    private readonly scraper: WebsiteScraperPort,
    private readonly cache: ProfileCacheService,
  ) {}

  async getProfile(url: string, companyName?: string): Promise<CompanyProfile> {
    if (!isValidWebsiteUrl(url)) {
      throw new BadRequestException('Invalid website URL');
    }

    let profile = this.cache.get(url);
    if (profile) {
      this.logger.log(`📦 Usando perfil cacheado para ${extractDomain(url)}`);
    } else {
      this.logger.log(`🕷️ Scraping directo: ${url}`);
      profile = await this.scraper.scrape(url, { companyName });
      if (!companyName) this.cache.set(url, profile);
    }

    const copy = profile.clone();
    if (companyName) copy.name = companyName;
    return copy;
  }

  /** Limpia perfiles viejos del cache */
  evictStaleProfiles(): number {
    return this.cache.evictStale();
  }
}
