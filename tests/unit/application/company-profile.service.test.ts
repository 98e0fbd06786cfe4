import { BadRequestException } from '@nestjs/common';
import { CompanyProfileService } from '../../../src/application/services/company-profile.service';
import { ProfileCacheService } from '../../../src/application/services/profile-cache.service';
import { CompanyProfile } from '../../../src/domain/entities/company-profile.entity';
import { WebsiteScraperPort } from '../../../src/domain/ports/website-scraper.port';
import { CheerioScraperAdapter } from '../../../src/infrastructure/adapters/cheerio-scraper.adapter';
import { FakePageFetcher, configWith, ok } from '../../helpers/fake-page-fetcher';

describe('CompanyProfileService', () => {
  let scrape: jest.Mock;
  let service: CompanyProfileService;

  beforeEach(() => {
    scrape = jest.fn(async (url: string) => {
      const profile = new CompanyProfile(url);
      profile.name = 'Acme Robotics';
      profile.productsServices = ['Robotic Arms'];
      return profile;
    });
    const scraper: WebsiteScraperPort = { scrape };
    service = new CompanyProfileService(scraper, new ProfileCacheService(configWith({})));
  });

  it('rejects URLs without an http(s) scheme', async () => {
    await expect(service.getProfile('ftp://acme.example/')).rejects.toBeInstanceOf(BadRequestException);
    await expect(service.getProfile('acme.example')).rejects.toBeInstanceOf(BadRequestException);
    expect(scrape).not.toHaveBeenCalled();
  });

  it('scrapes once per domain and day', async () => {
    await service.getProfile('https://acme.example/');
    await service.getProfile('https://www.acme.example/about');

    expect(scrape).toHaveBeenCalledTimes(1);
    expect(scrape).toHaveBeenCalledWith('https://acme.example/', { companyName: undefined });
  });

  it('applies a supplied company name to the returned copy only', async () => {
    const named = await service.getProfile('https://acme.example/', 'Acme Holdings');
    const unnamed = await service.getProfile('https://acme.example/');

    expect(named.name).toBe('Acme Holdings');
    expect(unnamed.name).toBe('Acme Robotics');
  });

  it('hands out copies that do not share lists with the cache', async () => {
    const first = await service.getProfile('https://acme.example/');
    first.productsServices.push('Mutated');

    const second = await service.getProfile('https://acme.example/');
    expect(second.productsServices).toEqual(['Robotic Arms']);
  });

  it('does not cache a profile scraped under a supplied name', async () => {
    await service.getProfile('https://acme.example/', 'Acme Holdings');
    await service.getProfile('https://acme.example/');

    expect(scrape).toHaveBeenCalledTimes(2);
    expect(scrape).toHaveBeenLastCalledWith('https://acme.example/', { companyName: undefined });
  });

  it('keeps one caller\'s company name away from the next caller', async () => {
    const fetcher = new FakePageFetcher({
      'https://acme.example/': ok('<html><head><title>Acme Robotics | Home</title></head><body></body></html>'),
    });
    const scraper = new CheerioScraperAdapter(fetcher, configWith({}));
    const real = new CompanyProfileService(scraper, new ProfileCacheService(configWith({})));

    const named = await real.getProfile('https://acme.example/', 'Caller One Inc');
    const unnamed = await real.getProfile('https://acme.example/');

    expect(named.name).toBe('Caller One Inc');
    expect(unnamed.name).toBe('Acme Robotics');
  });
});
