import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as cheerio from 'cheerio';
import { WebsiteScraperPort, ScrapeOptions } from '../../domain/ports/website-scraper.port';
import { PAGE_FETCHER_PORT, PageFetcherPort } from '../../domain/ports/page-fetcher.port';
import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import { FIELD_EXTRACTORS } from '../scraper/extractors';
import { inferIndustry } from '../../shared/utils/industry-inference';
import { postProcessProfile } from '../../shared/utils/profile-post-processor';
import { resolveUrl } from '../../shared/utils/url';

const DEFAULT_CANDIDATE_PATHS = ['about', 'about-us', 'company', 'services', 'products', 'solutions', 'what-we-do'];

/**
 * Adaptador de scraping HTTP puro con Cheerio.
 *
 * 1. Fetch de la home
 * 2. Fetch de sub-páginas conocidas (about, services, ...) hasta el techo de páginas
 * 3. Cada página con 200 pasa por todos los extractores, en orden
 * 4. Inferencia de industria por keywords (si no se encontró)
 * 5. Post-proceso: limpieza de falsos positivos y defaults por industria
 *
 * Best-effort: nunca rechaza. Si algo explota devuelve el perfil parcial.
 */
@Injectable()
export class CheerioScraperAdapter implements WebsiteScraperPort {
  private readonly logger = new Logger(CheerioScraperAdapter.name);
  private readonly maxPages: number;
  private readonly candidatePaths: string[];

  constructor(
    @Inject(PAGE_FETCHER_PORT)
    private readonly fetcher: PageFetcherPort,
    private readonly config: ConfigService,
  ) {
    this.maxPages = this.config.get<number>('scraper.maxPages', 5);
    this.candidatePaths = this.config.get<string[]>('scraper.candidatePaths', DEFAULT_CANDIDATE_PATHS);
  }

  async scrape(url: string, options?: ScrapeOptions): Promise<CompanyProfile> {
    const startTime = Date.now();
    const profile = new CompanyProfile(url);
    if (options?.companyName) profile.fill('name', options.companyName.trim());

    this.logger.log(`🕷️  Scraping: ${url}`);

    try {
      const visited = new Set<string>();
      let pagesFetched = 0;

      const queue = [url, ...this.candidatePaths.map((path) => resolveUrl(path, url))];

      for (const pageUrl of queue) {
        if (pagesFetched >= this.maxPages) break;
        if (!pageUrl) continue;

        const key = resolveUrl(pageUrl, pageUrl) ?? pageUrl;
        if (visited.has(key)) continue;
        visited.add(key);
        pagesFetched++;

        await this.scrapePage(pageUrl, profile);
      }

      if (!profile.industry) {
        profile.industry = inferIndustry(profile);
        if (profile.industry) this.logger.debug(`   🏷️ Industria inferida: ${profile.industry}`);
      }

      postProcessProfile(profile, url);

      profile.durationMs = Date.now() - startTime;
      this.logger.log(
        `✅ Scraping completado: ${profile.summary} (${pagesFetched} páginas, ${profile.durationMs}ms)`,
      );
      return profile;
    } catch (error) {
      profile.durationMs = Date.now() - startTime;
      this.logger.error(`❌ Error scraping ${url}: ${(error as Error).message}`);
      return profile;
    }
  }

  /**
   * Baja una página y corre los extractores sobre ella.
   * Status distinto de 200 o error de red → se loguea y se sigue.
   */
  private async scrapePage(url: string, profile: CompanyProfile): Promise<void> {
    try {
      const page = await this.fetcher.fetch(url);

      if (page.statusCode !== 200) {
        this.logger.warn(`   ⚠️  HTTP ${page.statusCode} para ${url}`);
        return;
      }

      this.logger.log(`   📄 Página: ${url}`);
      profile.pagesScraped.push(url);

      const context = { url, $: cheerio.load(page.html) };
      for (const extractor of FIELD_EXTRACTORS) {
        extractor.extract(context, profile);
      }
    } catch (err) {
      this.logger.warn(`   ⚠️  Error en página ${url}: ${(err as Error).message}`);
    }
  }
}
