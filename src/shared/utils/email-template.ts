import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import { GeneratedEmail, SenderInfo } from '../../domain/ports/email-generator.port';

export const PHONE_PLACEHOLDER = '[Phone Number]';
export const WEBSITE_PLACEHOLDER = '[Website]';

const SUBJECT_PREFIX = 'subject:';

/** Nombre e industria con placeholder cuando el perfil no los tiene */
function displayName(profile: CompanyProfile): string {
  return profile.name || 'the company';
}

function displayIndustry(profile: CompanyProfile): string {
  return profile.industry || 'your industry';
}

/**
 * Prompt para el modelo: perfil de la empresa + remitente + reglas de redacción.
 * El modelo debe responder "Subject: ..." seguido del cuerpo.
 */
export function buildEmailPrompt(profile: CompanyProfile, sender: SenderInfo): string {
  return [
    'You are an expert cold email writer for an AI company. Using the company information below, ' +
      'create a personalized, concise, and compelling cold email that offers AI solutions tailored ' +
      'to their specific business needs.',
    '',
    'COMPANY INFORMATION:',
    `Name: ${displayName(profile)}`,
    `Description: ${profile.description}`,
    `About: ${profile.about}`,
    `Products/Services: ${profile.productsServices.join(', ')}`,
    `Industry: ${displayIndustry(profile)}`,
    `Values: ${profile.values.join(', ')}`,
    '',
    'SENDER INFORMATION:',
    `Name: ${sender.name}`,
    `Company: ${sender.company}`,
    `Specialization: ${sender.specialization}`,
    `Phone: ${sender.phone || PHONE_PLACEHOLDER}`,
    `Website: ${sender.website || WEBSITE_PLACEHOLDER}`,
    '',
    'REQUIREMENTS:',
    '1. Keep the email under 200 words',
    '2. Include a personalized subject line that mentions the company name and a specific benefit',
    '3. Demonstrate understanding of their business and industry challenges',
    '4. Mention 2-3 specific ways your AI solutions could help, based on their products/services',
    '5. Highlight problems they might be facing that your AI can solve, with concrete examples',
    '6. Include a clear but non-pushy call to action (like scheduling a brief call)',
    '7. Avoid generic language, spam-like phrases, and excessive formality',
    '8. Do not mention that you scraped their website',
    '9. If the company has specific values, subtly align with them',
    "10. Include the sender's name, company, phone number, and website in the signature",
    '',
    'FORMAT YOUR RESPONSE AS:',
    'Subject: [email subject]',
    '',
    '[email body with greeting and signature]',
  ].join('\n');
}

/**
 * Separa asunto y cuerpo de la respuesta del modelo.
 *
 * - Primera línea que empiece con "subject:" (sin importar mayúsculas) → asunto,
 *   todo lo que sigue → cuerpo
 * - Si no hay, la primera línea es el asunto
 * - Los placeholders de teléfono/web se reemplazan con los datos del remitente
 *
 * @returns null si la respuesta viene vacía
 */
export function parseEmailCompletion(text: string, sender: SenderInfo): GeneratedEmail | null {
  const lines = text.trim().split('\n');
  if (!lines[0]) return null;

  let subject = '';
  let body = '';

  const subjectIndex = lines.findIndex((line) => line.trim().toLowerCase().startsWith(SUBJECT_PREFIX));
  if (subjectIndex >= 0) {
    subject = lines[subjectIndex].trim().slice(SUBJECT_PREFIX.length).trim();
    body = lines.slice(subjectIndex + 1).join('\n').trim();
  }

  if (!subject) {
    subject = lines[0].trim();
    body = lines.slice(1).join('\n').trim();
  }

  if (sender.phone) body = body.split(PHONE_PLACEHOLDER).join(sender.phone);
  if (sender.website) body = body.split(WEBSITE_PLACEHOLDER).join(sender.website);

  return { subject, body };
}

/** Email determinístico para cuando el modelo no está disponible o falla */
export function buildFallbackEmail(profile: CompanyProfile, sender: SenderInfo): GeneratedEmail {
  const name = displayName(profile);
  const signature = [sender.name, sender.company, sender.phone, sender.website].filter(Boolean);

  return {
    subject: `AI Solutions for ${name}`,
    body: [
      `Dear ${name} Team,`,
      '',
      `I recently came across your company and was impressed by what you're doing in the ${displayIndustry(profile)} space. ` +
        `I believe our AI solutions at ${sender.company} could help enhance your operations.`,
      '',
      'Would you be open to a brief conversation about how we might be able to support your goals?',
      '',
      'Best regards,',
      ...signature,
    ].join('\n'),
  };
}
