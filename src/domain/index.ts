export { CompanyProfile } from './entities/company-profile.entity';
export type { ProfileTextField, ProfileListField } from './entities/company-profile.entity';
export { PageFetchError } from './errors/page-fetch.error';
export { WEBSITE_SCRAPER_PORT } from './ports/website-scraper.port';
export type { WebsiteScraperPort, ScrapeOptions } from './ports/website-scraper.port';
export { PAGE_FETCHER_PORT } from './ports/page-fetcher.port';
export type { PageFetcherPort, FetchedPage } from './ports/page-fetcher.port';
export { EMAIL_GENERATOR_PORT } from './ports/email-generator.port';
export type { EmailGeneratorPort, SenderInfo, GeneratedEmail } from './ports/email-generator.port';
export { MAIL_SENDER_PORT } from './ports/mail-sender.port';
export type { MailSenderPort, OutgoingMail, MailDeliveryResult } from './ports/mail-sender.port';
