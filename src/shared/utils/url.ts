/**
 * Una URL sirve si tiene esquema http(s) y host.
 */
export function isValidWebsiteUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

/**
 * Host sin "www." — "https://www.acme.io/about" → "acme.io".
 * URL inválida → "".
 */
export function extractDomain(url: string): string {
  try {
    const host = new URL(url).host.toLowerCase();
    return host.startsWith('www.') ? host.slice(4) : host;
  } catch {
    return '';
  }
}

/**
 * Resuelve una ruta relativa contra la URL base ("about" + "https://acme.io" → "https://acme.io/about").
 * Devuelve null si no se puede resolver.
 */
export function resolveUrl(path: string, baseUrl: string): string | null {
  try {
    return new URL(path, baseUrl).href;
  } catch {
    return null;
  }
}

/** Solo los dígitos de un texto */
export function digitsOf(text: string): string {
  return text.replace(/\D/g, '');
}
