import { CompanyProfile } from '../entities/company-profile.entity';

export const EMAIL_GENERATOR_PORT = 'EMAIL_GENERATOR_PORT';

/** Datos de quien envía el email */
export interface SenderInfo {
  name: string;
  company: string;
  specialization: string;
  phone?: string;
  website?: string;
}

export interface GeneratedEmail {
  subject: string;
  body: string;
}

/**
 * Puerto para redactar un email en frío a partir de un perfil.
 * Nunca rechaza: si el modelo falla devuelve un email de respaldo determinístico.
 */
export interface EmailGeneratorPort {
  generate(profile: CompanyProfile, sender: SenderInfo): Promise<GeneratedEmail>;
}
