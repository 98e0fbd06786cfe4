import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as https from 'https';
import * as http from 'http';
import { FetchedPage, PageFetcherPort } from '../../domain/ports/page-fetcher.port';
import { PageFetchError } from '../../domain/errors/page-fetch.error';

/**
 * Cliente HTTP puro (sin browser) para bajar páginas.
 *
 * - User-Agent de browser real, rotando entre los configurados
 * - Sigue hasta `maxRedirects` redirects
 * - Timeout por request; vencido → PageFetchError('timeout')
 * - Cualquier status final (404, 500...) se devuelve tal cual
 */
@Injectable()
export class HttpPageFetcherAdapter implements PageFetcherPort {
  private readonly logger = new Logger(HttpPageFetcherAdapter.name);
  private readonly userAgents: string[];
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;

  constructor(private readonly config: ConfigService) {
    this.userAgents = this.config.get<string[]>('scraper.userAgents', [
      'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 Chrome/120.0.0.0 Safari/537.36',
    ]);
    this.timeoutMs = this.config.get<number>('scraper.requestTimeoutMs', 10000);
    this.maxRedirects = this.config.get<number>('scraper.maxRedirects', 3);
  }

  fetch(url: string): Promise<FetchedPage> {
    return this.request(url, this.maxRedirects);
  }

  private request(url: string, redirectsLeft: number): Promise<FetchedPage> {
    return new Promise((resolve, reject) => {
      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch {
        reject(new PageFetchError(url, 'network', `URL inválida: ${url}`));
        return;
      }

      const ua = this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
      const client = parsed.protocol === 'https:' ? https : http;

      const req = client.request(
        {
          hostname: parsed.hostname,
          port: parsed.port,
          path: parsed.pathname + parsed.search,
          method: 'GET',
          headers: {
            'User-Agent': ua,
            Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
            'Accept-Language': 'en-US,en;q=0.5',
            'Accept-Encoding': 'identity',
            Connection: 'keep-alive',
            'Upgrade-Insecure-Requests': '1',
          },
        },
        (res) => {
          const status = res.statusCode ?? 0;

          if (status >= 300 && status < 400 && res.headers.location) {
            res.resume();
            if (redirectsLeft <= 0) {
              reject(new PageFetchError(url, 'redirects', `Demasiados redirects desde ${url}`));
              return;
            }
            let redirectUrl: string;
            try {
              redirectUrl = new URL(res.headers.location, url).href;
            } catch {
              reject(new PageFetchError(url, 'network', `Redirect inválido desde ${url}: ${res.headers.location}`));
              return;
            }
            this.logger.debug(`   ↪ Redirect: ${redirectUrl}`);
            this.request(redirectUrl, redirectsLeft - 1).then(resolve, reject);
            return;
          }

          let html = '';
          res.setEncoding('utf8');
          res.on('data', (chunk: string) => (html += chunk));
          res.on('end', () => resolve({ url, statusCode: status, html }));
          res.on('error', (err) => reject(new PageFetchError(url, 'network', err.message)));
        },
      );

      req.on('error', (err) => reject(new PageFetchError(url, 'network', err.message)));

      req.setTimeout(this.timeoutMs, () => {
        req.destroy();
        reject(new PageFetchError(url, 'timeout', `Timeout (${this.timeoutMs}ms) en ${url}`));
      });

      req.end();
    });
  }
}
