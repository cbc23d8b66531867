import type { Request } from 'express';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The parsed form body, or an empty object when nothing was posted. */
export function formBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function isAjaxRequest(req: Request): boolean {
  return Boolean(
    req.xhr ||
      req.headers['x-requested-with'] === 'XMLHttpRequest' ||
      req.headers.accept?.includes('json') ||
      req.headers['content-type']?.includes('json'),
  );
}

/**
 * Path of the page the browser came from, if it belongs to this host.
 * Foreign or malformed referers fall back.
 */
export function backUrl(req: Request, fallback = '/'): string {
  const referer = req.get('referer');
  if (!referer) return fallback;
  try {
    const url = new URL(referer, 'http://placeholder.invalid');
    const host = req.get('host');
    if (url.host !== 'placeholder.invalid' && url.host !== host) {
      return fallback;
    }
    return `${url.pathname}${url.search}`;
  } catch {
    return fallback;
  }
}
