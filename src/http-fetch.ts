import type { Logger } from 'pino';
import { AUTHENTICATED_MARKER } from './login/credential-injector';
import { PortalSession } from './session';

export type PageFetcher = (url: string, session: PortalSession) => Promise<string | null>;

export interface HttpFetchOptions {
  timeoutMs: number;
  /** A response that ends up outside this domain is not the requested page. */
  portalDomain: string;
  logger: Logger;
}

const DEFAULT_CHARSET = 'utf-8';

export function charsetOf(contentType: string | null): string {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match ? match[1].toLowerCase() : DEFAULT_CHARSET;
}

export function decodeBody(body: ArrayBuffer, contentType: string | null, logger: Logger): string {
  const charset = charsetOf(contentType);
  try {
    return new TextDecoder(charset).decode(body);
  } catch (error) {
    logger.warn({ err: error, charset }, 'Unknown charset; decoding as utf-8');
    return new TextDecoder(DEFAULT_CHARSET).decode(body);
  }
}

/**
 * Re-fetches `url` outside the browser with the session's cookies.
 * Returns `null` on any failure, including a redirect away from the portal
 * or a page without the signed-in marker, so the caller can use the browser's markup instead.
 */
export async function fetchPageViaHttp(
  url: string,
  session: PortalSession,
  options: HttpFetchOptions
): Promise<string | null> {
  const { logger, timeoutMs, portalDomain } = options;

  try {
    const cookie = await session.cookieHeader(url);
    const response = await fetch(url, {
      headers: { cookie, accept: 'text/html' },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      logger.warn({ url, status: response.status }, 'HTTP fetch returned an error status');
      return null;
    }

    const finalUrl = response.url || url;
    if (!finalUrl.includes(portalDomain)) {
      logger.warn({ url, finalUrl }, 'HTTP fetch was redirected away from the portal');
      return null;
    }

    const html = decodeBody(await response.arrayBuffer(), response.headers.get('content-type'), logger);
    if (!html.includes(AUTHENTICATED_MARKER)) {
      logger.warn({ url }, 'HTTP fetch returned a page without an active session');
      return null;
    }

    logger.debug({ url, length: html.length }, 'Fetched page via HTTP');
    return html;
  } catch (error) {
    logger.warn({ err: error, url }, 'HTTP fetch failed');
    return null;
  }
}

export function createHttpFetcher(options: HttpFetchOptions): PageFetcher {
  return (url, session) => fetchPageViaHttp(url, session, options);
}
