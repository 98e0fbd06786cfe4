import { ProfileCacheService, dayBucket } from '../../../src/application/services/profile-cache.service';
import { CompanyProfile } from '../../../src/domain/entities/company-profile.entity';
import { configWith } from '../../helpers/fake-page-fetcher';

const DAY = 86_400_000;
const at = (day: number) => day * DAY + 1234;

describe('ProfileCacheService', () => {
  let cache: ProfileCacheService;

  beforeEach(() => {
    cache = new ProfileCacheService(configWith({ scraper: { cache: { retentionDays: 7 } } }));
  });

  it('keys entries by domain and day', () => {
    expect(dayBucket(at(20000))).toBe(20000);
    expect(cache.keyFor('https://www.acme.io/about', at(20000))).toBe('acme.io_20000');
  });

  it('returns a profile stored the same day for any URL of the domain', () => {
    const profile = new CompanyProfile('https://acme.io/');
    cache.set('https://acme.io/', profile, at(100));

    expect(cache.get('https://www.acme.io/services', at(100))).toBe(profile);
    expect(cache.get('https://acme.io/', at(101))).toBeUndefined();
  });

  it('evicts entries older than the retention window', () => {
    cache.set('https://old.example/', new CompanyProfile('https://old.example/'), at(100));
    cache.set('https://edge.example/', new CompanyProfile('https://edge.example/'), at(103));
    cache.set('https://new.example/', new CompanyProfile('https://new.example/'), at(110));

    expect(cache.evictStale(at(110))).toBe(1);
    expect(cache.size).toBe(2);
    expect(cache.get('https://edge.example/', at(103))).toBeDefined();
  });

  it('evicts entries whose key has no domain', () => {
    cache.set('not a url', new CompanyProfile('not a url'), at(110));

    expect(cache.evictStale(at(110))).toBe(1);
    expect(cache.size).toBe(0);
  });
});
