import { FieldExtractor, NamedStrategy, PageContext, firstAccepted } from '../strategy';
import { findMarked, spacedText } from '../dom';
import { CONTACT_SEPARATOR, MIN_PHONE_DIGITS } from '../../../shared/utils/profile-post-processor';
import { digitsOf, resolveUrl } from '../../../shared/utils/url';

const CONTACT_SECTION_PATTERN = /contact|footer|connect|get-in-touch/i;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/** Prefijo internacional opcional, código de área opcional, 6-8 dígitos en dos bloques */
const PHONE_PATTERN = /(?:(?:\+|00)[0-9]{1,3}[-\s]?)?(?:(?:\(\d{1,4}\)|\d{1,4})[-\s]?)?\d{3,4}[-\s]?\d{3,4}/g;

/** Redes sociales en orden de preferencia, por host */
const SOCIAL_NETWORKS: ReadonlyArray<{ label: string; host: RegExp }> = [
  { label: 'LinkedIn', host: /(^|\.)linkedin\.com$/i },
  { label: 'Twitter', host: /(^|\.)(twitter\.com|x\.com)$/i },
  { label: 'Facebook', host: /(^|\.)facebook\.com$/i },
  { label: 'Instagram', host: /(^|\.)instagram\.com$/i },
];

export const MAX_SOCIAL_LINKS = 2;

export interface ContactDetails {
  email?: string;
  phone?: string;
}

/** Los 7+ dígitos descartan fechas y números cortos */
const isPlausiblePhone = (candidate: string): boolean => digitsOf(candidate).length >= MIN_PHONE_DIGITS;

export function findEmail(text: string): string | undefined {
  return text.match(EMAIL_PATTERN)?.[0];
}

export function findPhone(text: string): string | undefined {
  return (text.match(PHONE_PATTERN) ?? []).map((match) => match.trim()).find(isPlausiblePhone);
}

const hasAny = (details: ContactDetails): boolean => Boolean(details.email || details.phone);

/** (a) email y teléfono dentro de secciones contact/footer/connect */
const fromContactSections: NamedStrategy<ContactDetails> = {
  name: 'contact-sections',
  run: ({ $ }) => {
    const details: ContactDetails = {};
    for (const section of findMarked($, ['div', 'section', 'footer', 'address', 'article'], CONTACT_SECTION_PATTERN)) {
      const text = spacedText(section);
      if (!details.email) details.email = findEmail(text);
      if (!details.phone) details.phone = findPhone(text);
      if (details.email && details.phone) break;
    }
    return details;
  },
};

/** (b) links mailto: y tel: de toda la página */
const fromMailtoAndTelLinks: NamedStrategy<ContactDetails> = {
  name: 'mailto-tel-links',
  run: ({ $ }) => {
    const hrefs = $('a[href]')
      .toArray()
      .map((link) => link.attribs.href);

    const email = hrefs
      .filter((href) => /^mailto:/i.test(href))
      .map((href) => href.replace(/^mailto:/i, '').split('?')[0].trim())
      .find((address) => address.includes('@'));

    const phone = hrefs
      .filter((href) => /^tel:/i.test(href))
      .map((href) => href.replace(/^tel:/i, '').trim())
      .find(isPlausiblePhone);

    return { email, phone };
  },
};

/** (c) regex sobre todo el texto de la página */
const fromPageText: NamedStrategy<ContactDetails> = {
  name: 'page-text',
  run: ({ $ }) => {
    const root = $.root().get(0);
    if (!root) return null;
    const text = spacedText(root);
    return { email: findEmail(text), phone: findPhone(text) };
  },
};

export const CONTACT_STRATEGIES: readonly NamedStrategy<ContactDetails>[] = [
  fromContactSections,
  fromMailtoAndTelLinks,
  fromPageText,
];

/** Primeros links a redes sociales ("LinkedIn: https://...") */
export function findSocialLinks({ $, url }: PageContext): string[] {
  const links: string[] = [];
  const hrefs = $('a[href]')
    .toArray()
    .map((link) => link.attribs.href);

  for (const { label, host } of SOCIAL_NETWORKS) {
    const match = hrefs.find((href) => {
      const absolute = resolveUrl(href, url);
      return absolute !== null && host.test(new URL(absolute).hostname);
    });
    if (match) links.push(`${label}: ${match}`);
    if (links.length >= MAX_SOCIAL_LINKS) break;
  }

  return links;
}

export const contactExtractor: FieldExtractor = {
  field: 'contact',
  extract(page, profile) {
    if (profile.contact) return;

    const found = firstAccepted(CONTACT_STRATEGIES, page, profile, hasAny);
    const fragments: string[] = [];
    if (found?.value.email) fragments.push(`Email: ${found.value.email}`);
    if (found?.value.phone) fragments.push(`Phone: ${found.value.phone}`);
    fragments.push(...findSocialLinks(page));

    profile.fill('contact', fragments.join(CONTACT_SEPARATOR));
  },
};
