export const MAIL_SENDER_PORT = 'MAIL_SENDER_PORT';

export interface OutgoingMail {
  to: string;
  subject: string;
  body: string;
  fromName?: string;
  cc?: string[];
  bcc?: string[];
}

export interface MailDeliveryResult {
  success: boolean;
  /** Mensaje legible ("Email successfully sent to ...", o el error) */
  message: string;
  messageId?: string;
}

/**
 * Puerto para entregar emails vía un proveedor.
 * Nunca rechaza: los fallos vuelven como { success: false }.
 */
export interface MailSenderPort {
  send(mail: OutgoingMail): Promise<MailDeliveryResult>;

  /** ¿Hay credenciales/transport configurado? */
  isConfigured(): boolean;
}
