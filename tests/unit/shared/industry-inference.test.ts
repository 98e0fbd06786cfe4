import { CompanyProfile } from '../../../src/domain/entities/company-profile.entity';
import {
  buildIndustryCorpus,
  countOccurrences,
  inferIndustry,
  scoreIndustries,
} from '../../../src/shared/utils/industry-inference';
import { IndustryKeywords } from '../../../src/shared/constants/keyword-tables';

const profileWith = (fields: Partial<Pick<CompanyProfile, 'name' | 'description' | 'about'>>): CompanyProfile => {
  const profile = new CompanyProfile('https://acme.example/');
  Object.assign(profile, fields);
  return profile;
};

describe('industry inference', () => {
  describe('countOccurrences', () => {
    it('counts non-overlapping substring matches', () => {
      expect(countOccurrences('aaaa', 'aa')).toBe(2);
      expect(countOccurrences('quality it', 'it')).toBe(2);
      expect(countOccurrences('anything', '')).toBe(0);
    });
  });

  describe('buildIndustryCorpus', () => {
    it('joins every text field in lower case', () => {
      const profile = profileWith({ name: 'Acme', description: 'Robots', about: 'We BUILD' });
      profile.productsServices = ['Arms'];
      profile.values = ['Safety'];

      expect(buildIndustryCorpus(profile)).toBe('acme robots we build arms safety');
    });
  });

  describe('scoreIndustries', () => {
    it('scores technology keywords found in the about text', () => {
      const profile = profileWith({ about: 'we provide software and cloud platforms for enterprises' });

      const scores = scoreIndustries(profile);
      expect(scores.get('Technology')).toBe(3);
      expect(scores.get('Finance')).toBe(0);
    });

    it('adds the name/description bonus on top of the occurrence count', () => {
      const profile = profileWith({ description: 'we provide software and cloud platforms for enterprises' });

      expect(scoreIndustries(profile).get('Technology')).toBe(9);
    });

    it('caps each keyword at three occurrences', () => {
      const table: IndustryKeywords[] = [{ industry: 'Robotics', keywords: ['robot'] }];
      const profile = profileWith({ about: 'robot robot robot robot robot' });

      expect(scoreIndustries(profile, table).get('Robotics')).toBe(3);
    });
  });

  describe('inferIndustry', () => {
    it('selects Technology for a software/cloud/platform corpus', () => {
      const profile = profileWith({ about: 'we provide software and cloud platforms for enterprises' });

      expect(inferIndustry(profile)).toBe('Technology');
    });

    it('breaks ties by table order', () => {
      const table: IndustryKeywords[] = [
        { industry: 'First', keywords: ['alpha'] },
        { industry: 'Second', keywords: ['beta'] },
      ];
      const profile = profileWith({ about: 'alpha beta' });

      expect(inferIndustry(profile, table)).toBe('First');
    });

    it('returns an empty string when nothing scores', () => {
      const table: IndustryKeywords[] = [{ industry: 'Robotics', keywords: ['robot'] }];

      expect(inferIndustry(profileWith({ about: 'bakery' }), table)).toBe('');
    });
  });
});
