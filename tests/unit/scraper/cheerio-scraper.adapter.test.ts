import { Logger } from '@nestjs/common';
import { CheerioScraperAdapter } from '../../../src/infrastructure/adapters/cheerio-scraper.adapter';
import { PageFetchError } from '../../../src/domain/errors/page-fetch.error';
import * as postProcessor from '../../../src/shared/utils/profile-post-processor';
import { FakePageFetcher, configWith, ok } from '../../helpers/fake-page-fetcher';

const BASE = 'https://acme.example/';

const HOME = `
<html>
  <head>
    <title>Acme Robotics | Home</title>
    <meta name="description" content="Industrial robots and cloud software for small factories.">
  </head>
  <body>
    <section class="services"><h3>Robotic Arms</h3><h3>Fleet Monitoring</h3><h3>Predictive Maintenance</h3></section>
    <footer class="footer"><p>hello@acme.example</p><p>+1 555 010 2030</p></footer>
  </body>
</html>`;

const ABOUT = `
<html>
  <head><title>About Us | Acme Corp</title></head>
  <body>
    <div class="about"><p>Acme Robotics was founded in 2010 to bring affordable automation to small factories.</p></div>
    <section class="values"><h3>Safety</h3><h3>Quality</h3></section>
  </body>
</html>`;

const scraperFor = (fetcher: FakePageFetcher, scraper: Record<string, unknown> = {}) =>
  new CheerioScraperAdapter(fetcher, configWith({ scraper }));

describe('CheerioScraperAdapter', () => {
  it('builds a profile from the home page and the about page', async () => {
    const fetcher = new FakePageFetcher({ [BASE]: ok(HOME), [`${BASE}about`]: ok(ABOUT) });

    const profile = await scraperFor(fetcher).scrape(BASE);

    expect(profile.name).toBe('Acme Robotics');
    expect(profile.description).toBe('Industrial robots and cloud software for small factories.');
    expect(profile.about).toBe('Industrial robots and cloud software for small factories.');
    expect(profile.productsServices).toEqual(['Robotic Arms', 'Fleet Monitoring', 'Predictive Maintenance']);
    expect(profile.contact).toBe('Email: hello@acme.example | Phone: +1 555 010 2030');
    expect(profile.values).toEqual(['Safety', 'Quality']);
    expect(profile.pagesScraped).toEqual([BASE, `${BASE}about`]);
  });

  it('stops after five fetch attempts', async () => {
    const fetcher = new FakePageFetcher({ [BASE]: ok(HOME) });

    await scraperFor(fetcher).scrape(BASE);

    expect(fetcher.requested).toEqual([
      BASE,
      `${BASE}about`,
      `${BASE}about-us`,
      `${BASE}company`,
      `${BASE}services`,
    ]);
  });

  it('honours a configured page ceiling', async () => {
    const fetcher = new FakePageFetcher({ [BASE]: ok(HOME) });

    await scraperFor(fetcher, { maxPages: 2 }).scrape(BASE);

    expect(fetcher.requested).toEqual([BASE, `${BASE}about`]);
  });

  it('never fetches the same URL twice', async () => {
    const fetcher = new FakePageFetcher({ [BASE]: ok(HOME) });

    await scraperFor(fetcher, { candidatePaths: ['about', './about', '/about', ''] }).scrape(BASE);

    expect(fetcher.requested).toEqual([BASE, `${BASE}about`]);
  });

  it('skips non-200 pages', async () => {
    const fetcher = new FakePageFetcher({
      [BASE]: ok(HOME),
      [`${BASE}about`]: { status: 500, html: '<title>Broken Co</title>' },
    });

    const profile = await scraperFor(fetcher).scrape(BASE);

    expect(profile.pagesScraped).toEqual([BASE]);
    expect(profile.about).toBe('Industrial robots and cloud software for small factories.');
  });

  it('keeps the first value found for scalar fields', async () => {
    const fetcher = new FakePageFetcher({ [BASE]: ok(HOME), [`${BASE}about`]: ok(ABOUT) });

    const profile = await scraperFor(fetcher).scrape(BASE);

    expect(profile.name).toBe('Acme Robotics');
    expect(profile.about).not.toContain('founded in 2010');
  });

  it('fills fields missing on the home page from later pages', async () => {
    const bareHome = '<html><head><title>Acme Robotics</title></head><body><p>Welcome</p></body></html>';
    const fetcher = new FakePageFetcher({ [BASE]: ok(bareHome), [`${BASE}about`]: ok(ABOUT) });

    const profile = await scraperFor(fetcher).scrape(BASE);

    expect(profile.name).toBe('Acme Robotics');
    expect(profile.about).toBe(
      'Acme Robotics was founded in 2010 to bring affordable automation to small factories.',
    );
  });

  it('pre-fills a known company name', async () => {
    const fetcher = new FakePageFetcher({ [BASE]: ok(HOME) });

    const profile = await scraperFor(fetcher).scrape(BASE, { companyName: '  Acme Holdings ' });

    expect(profile.name).toBe('Acme Holdings');
  });

  it('returns a best-effort profile when every fetch fails', async () => {
    const fetcher = new FakePageFetcher({ [BASE]: new PageFetchError(BASE, 'timeout') });

    const profile = await scraperFor(fetcher).scrape(BASE);

    expect(profile.pagesScraped).toEqual([]);
    expect(profile.name).toBe('');
    expect(profile.industry).toBe('');
    expect(profile.contact).toBe('LinkedIn: https://www.linkedin.com/company/acme | Website: https://acme.example/');
  });

  describe('when a stage after the crawl throws', () => {
    afterEach(() => jest.restoreAllMocks());

    it('returns the profile gathered so far', async () => {
      jest.spyOn(postProcessor, 'postProcessProfile').mockImplementation(() => {
        throw new Error('post-process roto');
      });
      const logError = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      const fetcher = new FakePageFetcher({ [BASE]: ok(HOME) });

      const profile = await scraperFor(fetcher, { maxPages: 1 }).scrape(BASE);

      expect(profile.name).toBe('Acme Robotics');
      expect(profile.contact).toBe('Email: hello@acme.example | Phone: +1 555 010 2030');
      expect(profile.pagesScraped).toEqual([BASE]);
      expect(logError).toHaveBeenCalledWith(`❌ Error scraping ${BASE}: post-process roto`);
    });
  });
});
