import * as http from 'http';
import { HttpPageFetcherAdapter } from '../../../src/infrastructure/adapters/http-page-fetcher.adapter';
import { PageFetchError } from '../../../src/domain';
import { configWith } from '../../helpers/fake-page-fetcher';

/**
 * Servidor local en un puerto efímero:
 *   /         → 200 con HTML
 *   /moved    → 301 a /
 *   /loop     → 302 a /loop (infinito)
 *   /broken   → 302 con un Location que no es una URL
 *   /missing  → 404
 *   /slow     → nunca responde
 */
function startServer(): Promise<http.Server> {
  const server = http.createServer((req, res) => {
    switch (req.url) {
      case '/':
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end('<html><title>Acme</title></html>');
        return;
      case '/moved':
        res.writeHead(301, { Location: '/' });
        res.end();
        return;
      case '/loop':
        res.writeHead(302, { Location: '/loop' });
        res.end();
        return;
      case '/broken':
        res.writeHead(302, { Location: 'http://[::1' });
        res.end();
        return;
      case '/slow':
        return;
      default:
        res.writeHead(404);
        res.end('Not found');
    }
  });
  return new Promise((resolve) => server.listen(0, '127.0.0.1', () => resolve(server)));
}

describe('HttpPageFetcherAdapter', () => {
  let server: http.Server;
  let base: string;
  let fetcher: HttpPageFetcherAdapter;

  beforeAll(async () => {
    server = await startServer();
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('el servidor de prueba no expuso un puerto');
    base = `http://127.0.0.1:${address.port}`;
    fetcher = new HttpPageFetcherAdapter(configWith({ scraper: { requestTimeoutMs: 200, maxRedirects: 3 } }));
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('returns the body and status of a page', async () => {
    const page = await fetcher.fetch(`${base}/`);

    expect(page).toEqual({ url: `${base}/`, statusCode: 200, html: '<html><title>Acme</title></html>' });
  });

  it('follows redirects', async () => {
    const page = await fetcher.fetch(`${base}/moved`);

    expect(page.statusCode).toBe(200);
    expect(page.html).toBe('<html><title>Acme</title></html>');
  });

  it('returns non-200 statuses as they are', async () => {
    const page = await fetcher.fetch(`${base}/missing`);

    expect(page.statusCode).toBe(404);
  });

  it('gives up after too many redirects', async () => {
    await expect(fetcher.fetch(`${base}/loop`)).rejects.toMatchObject({ reason: 'redirects' });
  });

  it('rejects a malformed redirect target as a network error', async () => {
    const error = await fetcher.fetch(`${base}/broken`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PageFetchError);
    expect(error).toMatchObject({ reason: 'network' });
  });

  it('times out slow pages', async () => {
    const error = await fetcher.fetch(`${base}/slow`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PageFetchError);
    expect(error).toMatchObject({ reason: 'timeout' });
  });

  it('rejects unreachable hosts as network errors', async () => {
    await expect(fetcher.fetch('http://127.0.0.1:1/')).rejects.toMatchObject({ reason: 'network' });
  });
});
