import { CompanyProfile } from '../../../domain/entities/company-profile.entity';
import { CompanyProfileResponseDto } from '../dtos/scrape-response.dto';

export function toProfileResponse(profile: CompanyProfile): CompanyProfileResponseDto {
  return {
    success: profile.fieldsExtracted > 0,
    sourceUrl: profile.sourceUrl,
    name: profile.name,
    description: profile.description,
    about: profile.about,
    productsServices: profile.productsServices,
    contact: profile.contact,
    industry: profile.industry,
    values: profile.values,
    team: profile.team,
    clients: profile.clients,
    pagesScraped: profile.pagesScraped,
    fieldsExtracted: profile.fieldsExtracted,
    durationMs: profile.durationMs,
    scrapedAt: profile.scrapedAt.toISOString(),
  };
}
