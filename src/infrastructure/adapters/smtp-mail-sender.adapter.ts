import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';
import { MailDeliveryResult, MailSenderPort, OutgoingMail } from '../../domain/ports/mail-sender.port';

export const MAIL_TRANSPORT = 'MAIL_TRANSPORT';

/** Transport SMTP, o null si no hay SMTP_HOST */
export function createMailTransport(config: ConfigService): Transporter | null {
  const host = config.get<string>('outreach.smtp.host', '');
  if (!host) return null;

  const user = config.get<string>('outreach.smtp.user', '');
  return nodemailer.createTransport({
    host,
    port: config.get<number>('outreach.smtp.port', 587),
    secure: config.get<boolean>('outreach.smtp.secure', false),
    auth: user ? { user, pass: config.get<string>('outreach.smtp.pass', '') } : undefined,
  });
}

/**
 * Entrega de emails vía nodemailer.
 * Nunca rechaza: los errores del transport vuelven como { success: false }.
 */
@Injectable()
export class SmtpMailSenderAdapter implements MailSenderPort {
  private readonly logger = new Logger(SmtpMailSenderAdapter.name);
  private readonly fromAddress: string;

  constructor(
    @Inject(MAIL_TRANSPORT)
    private readonly transport: Transporter | null,
    private readonly config: ConfigService,
  ) {
    this.fromAddress =
      this.config.get<string>('outreach.smtp.from', '') || this.config.get<string>('outreach.smtp.user', '');
  }

  isConfigured(): boolean {
    return this.transport !== null;
  }

  async send(mail: OutgoingMail): Promise<MailDeliveryResult> {
    if (!this.transport) {
      return { success: false, message: 'Mail delivery is not configured' };
    }

    const from = mail.fromName && this.fromAddress ? `"${mail.fromName}" <${this.fromAddress}>` : this.fromAddress;

    try {
      const info = await this.transport.sendMail({
        from: from || undefined,
        to: mail.to,
        cc: mail.cc && mail.cc.length > 0 ? mail.cc.join(',') : undefined,
        bcc: mail.bcc && mail.bcc.length > 0 ? mail.bcc.join(',') : undefined,
        subject: mail.subject,
        text: mail.body,
      });

      this.logger.log(`📤 Email enviado a ${mail.to} (${info.messageId})`);
      return {
        success: true,
        message: `Email successfully sent to ${mail.to}`,
        messageId: info.messageId,
      };
    } catch (error) {
      const message = (error as Error).message;
      this.logger.error(`❌ Error enviando email a ${mail.to}: ${message}`);
      return { success: false, message: `Failed to send email: ${message}` };
    }
  }
}
