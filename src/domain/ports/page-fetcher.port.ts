/**
 * Token de inyección para el cliente HTTP que baja páginas.
 */
export const PAGE_FETCHER_PORT = 'PAGE_FETCHER_PORT';

export interface FetchedPage {
  /** URL final (después de redirects) */
  url: string;
  statusCode: number;
  html: string;
}

/**
 * Puerto para bajar el HTML de una URL.
 *
 * Un status distinto de 200 NO es un error: se devuelve y el llamador decide.
 * Fallos de red, timeouts y exceso de redirects rechazan con PageFetchError.
 */
export interface PageFetcherPort {
  fetch(url: string): Promise<FetchedPage>;
}
