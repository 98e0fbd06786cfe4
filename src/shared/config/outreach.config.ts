import { registerAs } from '@nestjs/config';

export const outreachConfig = registerAs('outreach', () => ({
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  },

  /** Remitente por defecto (cada request puede pisar nombre y empresa) */
  sender: {
    name: process.env.SENDER_NAME || 'Our Team',
    company: process.env.SENDER_COMPANY || 'AI Solutions Inc.',
    specialization:
      process.env.SENDER_SPECIALIZATION || 'Custom AI solutions for business optimization and growth',
    phone: process.env.SENDER_PHONE || undefined,
    website: process.env.SENDER_WEBSITE || undefined,
  },

  /** SMTP para la entrega. Sin host → envío deshabilitado. */
  smtp: {
    host: process.env.SMTP_HOST || '',
    port: parseInt(process.env.SMTP_PORT || '587', 10),
    secure: process.env.SMTP_SECURE === 'true',
    user: process.env.SMTP_USER || '',
    pass: process.env.SMTP_PASS || '',
    from: process.env.MAIL_FROM || '',
  },
}));

export type OutreachConfig = ReturnType<typeof outreachConfig>;
