import * as cheerio from 'cheerio';
import { ConfigService } from '@nestjs/config';
import { FetchedPage, PageFetchError, PageFetcherPort } from '../../src/domain';
import { PageContext } from '../../src/infrastructure/scraper/strategy';

type FakeResponse = { status: number; html: string } | PageFetchError;

/**
 * Sitio en memoria: URL exacta → respuesta. Lo no registrado responde 404.
 */
export class FakePageFetcher implements PageFetcherPort {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, FakeResponse> = {}) {}

  async fetch(url: string): Promise<FetchedPage> {
    this.requested.push(url);
    const response = this.pages[url];
    if (response instanceof PageFetchError) throw response;
    if (!response) return { url, statusCode: 404, html: '<html><body>Not found</body></html>' };
    return { url, statusCode: response.status, html: response.html };
  }
}

export const ok = (html: string): FakeResponse => ({ status: 200, html });

export function pageOf(html: string, url = 'https://acme.example/'): PageContext {
  return { url, $: cheerio.load(html) };
}

export function configWith(values: Record<string, unknown>): ConfigService {
  return new ConfigService(values);
}
