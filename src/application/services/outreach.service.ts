import { Inject, Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CompanyProfileService } from './company-profile.service';
import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import {
  EMAIL_GENERATOR_PORT,
  EmailGeneratorPort,
  GeneratedEmail,
  SenderInfo,
} from '../../domain/ports/email-generator.port';
import {
  MAIL_SENDER_PORT,
  MailDeliveryResult,
  MailSenderPort,
  OutgoingMail,
} from '../../domain/ports/mail-sender.port';

export interface SenderOverrides {
  senderName?: string;
  senderCompany?: string;
  senderPhone?: string;
  senderWebsite?: string;
}

export interface GenerateEmailInput extends SenderOverrides {
  websiteUrl: string;
  companyName?: string;
}

export interface GenerateAndSendInput extends GenerateEmailInput {
  toEmail: string;
  cc?: string[];
  bcc?: string[];
}

export interface DraftedEmail extends GeneratedEmail {
  profile: CompanyProfile;
}

export interface SentDraftResult extends MailDeliveryResult {
  profile: CompanyProfile;
  subject: string;
}

/**
 * Orquesta el flujo de outreach:
 *
 *   web → perfil (cache o scraping) → email redactado → entrega SMTP
 *
 * Cada generación dispara además la limpieza del cache de perfiles.
 */
@Injectable()
export class OutreachService {
  private readonly logger = new Logger(OutreachService.name);
  private readonly defaultSender: SenderInfo;

  constructor(
    private readonly profiles: CompanyProfileService,
    @Inject(EMAIL_GENERATOR_PORT)
    private readonly generator: EmailGeneratorPort,
    @Inject(MAIL_SENDER_PORT)
    private readonly mailer: MailSenderPort,
    private readonly config: ConfigService,
  ) {
    this.defaultSender = {
      name: this.config.get<string>('outreach.sender.name', 'Our Team'),
      company: this.config.get<string>('outreach.sender.company', 'AI Solutions Inc.'),
      specialization: this.config.get<string>(
        'outreach.sender.specialization',
        'Custom AI solutions for business optimization and growth',
      ),
      phone: this.config.get<string>('outreach.sender.phone'),
      website: this.config.get<string>('outreach.sender.website'),
    };
  }

  /** Remitente por defecto con los datos del request encima */
  resolveSender(overrides: SenderOverrides): SenderInfo {
    return {
      ...this.defaultSender,
      name: overrides.senderName || this.defaultSender.name,
      company: overrides.senderCompany || this.defaultSender.company,
      phone: overrides.senderPhone || this.defaultSender.phone,
      website: overrides.senderWebsite || this.defaultSender.website,
    };
  }

  async generateEmail(input: GenerateEmailInput): Promise<DraftedEmail> {
    const profile = await this.profiles.getProfile(input.websiteUrl, input.companyName);
    const email = await this.generator.generate(profile, this.resolveSender(input));

    this.profiles.evictStaleProfiles();
    return { ...email, profile };
  }

  async sendEmail(mail: OutgoingMail): Promise<MailDeliveryResult> {
    if (!this.mailer.isConfigured()) {
      throw new ServiceUnavailableException('Mail delivery is not configured (SMTP_HOST)');
    }

    this.logger.log(`📨 Enviando "${mail.subject}" a ${mail.to}`);
    return this.mailer.send(mail);
  }

  async generateAndSend(input: GenerateAndSendInput): Promise<SentDraftResult> {
    if (!this.mailer.isConfigured()) {
      throw new ServiceUnavailableException('Mail delivery is not configured (SMTP_HOST)');
    }

    const draft = await this.generateEmail(input);
    const result = await this.sendEmail({
      to: input.toEmail,
      subject: draft.subject,
      body: draft.body,
      fromName: input.senderName,
      cc: input.cc,
      bcc: input.bcc,
    });

    return { ...result, profile: draft.profile, subject: draft.subject };
  }
}
