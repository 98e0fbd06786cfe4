import * as cheerio from 'cheerio';
import { AnyNode, Element, hasChildren, isTag, isText } from 'domhandler';

/** Etiquetas cuyo texto nunca es contenido visible */
const NON_CONTENT_TAGS = new Set(['script', 'style', 'noscript', 'template']);

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Texto visible de un elemento, con espacios colapsados */
export function textOf($: cheerio.CheerioAPI, el: Element): string {
  return cleanText($(el).text());
}

/**
 * Texto de un subárbol con cada fragmento recortado y separado por un espacio.
 * Evita que "info@acme.io" y "+1 555..." queden pegados cuando están en nodos distintos.
 */
export function spacedText(node: AnyNode): string {
  const parts: string[] = [];

  const walk = (current: AnyNode): void => {
    if (isText(current)) {
      const text = current.data.trim();
      if (text) parts.push(text);
      return;
    }
    if (isTag(current) && NON_CONTENT_TAGS.has(current.name)) return;
    if (hasChildren(current)) current.children.forEach(walk);
  };

  walk(node);
  return cleanText(parts.join(' '));
}

/**
 * ¿El class o el id del elemento matchea el patrón?
 * El patrón no debe llevar flag `g` (test() con estado).
 */
export function hasMarker(el: Element, pattern: RegExp): boolean {
  return pattern.test(el.attribs.class ?? '') || pattern.test(el.attribs.id ?? '');
}

/** Elementos de las etiquetas dadas cuyo class/id matchea, en orden de documento */
export function findMarked($: cheerio.CheerioAPI, tags: readonly string[], pattern: RegExp): Element[] {
  return $(tags.join(', '))
    .toArray()
    .filter(isTag)
    .filter((el) => hasMarker(el, pattern));
}

/** Headings (de las etiquetas dadas) cuyo texto matchea el patrón */
export function findHeadings($: cheerio.CheerioAPI, tags: readonly string[], pattern: RegExp): Element[] {
  return $(tags.join(', '))
    .toArray()
    .filter(isTag)
    .filter((el) => pattern.test(textOf($, el)));
}

/**
 * Primer elemento posterior a `from` en orden de documento (no solo hermanos)
 * cuya etiqueta esté en `tags`.
 */
export function findNext($: cheerio.CheerioAPI, from: Element, tags: readonly string[]): Element | null {
  const all = $('*').toArray().filter(isTag);
  const start = all.indexOf(from);
  if (start === -1) return null;

  for (let i = start + 1; i < all.length; i++) {
    if (tags.includes(all[i].name)) return all[i];
  }
  return null;
}

/** Contenido de un <meta> por name o property; "" si no está */
export function metaContent($: cheerio.CheerioAPI, attr: 'name' | 'property', value: string): string {
  return ($(`meta[${attr}="${value}"]`).first().attr('content') ?? '').trim();
}
