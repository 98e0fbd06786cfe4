/**
 * Una página no se pudo bajar (red, timeout, demasiados redirects).
 * Un status HTTP distinto de 200 no es un PageFetchError.
 */
export class PageFetchError extends Error {
  constructor(
    readonly url: string,
    readonly reason: 'network' | 'timeout' | 'redirects',
    message?: string,
  ) {
    super(message ?? `No se pudo obtener ${url} (${reason})`);
    this.name = 'PageFetchError';
  }
}
