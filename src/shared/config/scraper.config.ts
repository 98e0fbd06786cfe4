import { registerAs } from '@nestjs/config';

export const scraperConfig = registerAs('scraper', () => ({
  /** Puerto del microservicio */
  port: parseInt(process.env.SCRAPER_PORT || '3457', 10),

  /** Techo de páginas bajadas por scraping (home incluida) */
  maxPages: parseInt(process.env.SCRAPER_MAX_PAGES || '5', 10),

  /** Timeout por request (ms) */
  requestTimeoutMs: parseInt(process.env.SCRAPER_TIMEOUT_MS || '10000', 10),

  /** Redirects a seguir por request */
  maxRedirects: 3,

  /** Sub-páginas a probar después de la home, en este orden */
  candidatePaths: ['about', 'about-us', 'company', 'services', 'products', 'solutions', 'what-we-do'],

  /** Días que un perfil cacheado sigue siendo válido */
  cache: {
    retentionDays: parseInt(process.env.PROFILE_CACHE_RETENTION_DAYS || '7', 10),
  },

  /** User agents para rotación */
  userAgents: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  ],
}));

export type ScraperConfig = ReturnType<typeof scraperConfig>;
