import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScrapeController } from './controllers/scrape.controller';
import { EmailController } from './controllers/email.controller';
import { HealthController } from './controllers/health.controller';
import { CompanyProfileService } from '../../application/services/company-profile.service';
import { ProfileCacheService } from '../../application/services/profile-cache.service';
import { OutreachService } from '../../application/services/outreach.service';
import { HttpPageFetcherAdapter } from '../adapters/http-page-fetcher.adapter';
import { CheerioScraperAdapter } from '../adapters/cheerio-scraper.adapter';
import {
  CHAT_COMPLETION_CLIENT,
  OpenAiEmailGeneratorAdapter,
  createChatCompletionClient,
} from '../adapters/openai-email-generator.adapter';
import { MAIL_TRANSPORT, SmtpMailSenderAdapter, createMailTransport } from '../adapters/smtp-mail-sender.adapter';
import { PAGE_FETCHER_PORT } from '../../domain/ports/page-fetcher.port';
import { WEBSITE_SCRAPER_PORT } from '../../domain/ports/website-scraper.port';
import { EMAIL_GENERATOR_PORT } from '../../domain/ports/email-generator.port';
import { MAIL_SENDER_PORT } from '../../domain/ports/mail-sender.port';

@Module({
  imports: [ConfigModule],
  controllers: [ScrapeController, EmailController, HealthController],
  providers: [
    // Fetch de páginas (implementa PageFetcherPort) — HTTP puro, sin browser
    {
      provide: PAGE_FETCHER_PORT,
      useClass: HttpPageFetcherAdapter,
    },
    // Crawl + extractores (implementa WebsiteScraperPort) — Cheerio
    {
      provide: WEBSITE_SCRAPER_PORT,
      useClass: CheerioScraperAdapter,
    },
    // Redacción de emails — OpenAI (null sin API key → email de respaldo)
    {
      provide: CHAT_COMPLETION_CLIENT,
      useFactory: createChatCompletionClient,
      inject: [ConfigService],
    },
    {
      provide: EMAIL_GENERATOR_PORT,
      useClass: OpenAiEmailGeneratorAdapter,
    },
    // Entrega — nodemailer SMTP (null sin SMTP_HOST → 503)
    {
      provide: MAIL_TRANSPORT,
      useFactory: createMailTransport,
      inject: [ConfigService],
    },
    {
      provide: MAIL_SENDER_PORT,
      useClass: SmtpMailSenderAdapter,
    },
    // Servicios de aplicación
    ProfileCacheService,
    CompanyProfileService,
    OutreachService,
  ],
  exports: [CompanyProfileService, OutreachService],
})
export class OutreachModule {}
