import { config } from './config';

const SEC_HEADERS = {
  'User-Agent': config.secUserAgent,
  'Accept-Encoding': 'gzip, deflate',
};
const WEB_HEADERS = {
  'User-Agent': config.userAgent,
  'Accept-Language': 'en-US,en;q=0.9',
};

export function isSecUrl(url: string) {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === 'sec.gov' || host.endsWith('.sec.gov');
  } catch {
    return false;
  }
}

export function headersForUrl(url: string) {
  return isSecUrl(url) ? SEC_HEADERS : WEB_HEADERS;
}

async function request(url: string) {
  return fetch(url, {
    headers: headersForUrl(url),
    signal: AbortSignal.timeout(config.requestTimeoutMs),
  });
}

export async function fetchJson(url: string): Promise<unknown> {
  const res = await request(url);
  if (!res.ok) throw new Error(`Fetch failed ${res.status} for ${url}`);
  return res.json();
}

export async function fetchText(url: string) {
  const res = await request(url);
  if (!res.ok) throw new Error(`Fetch failed ${res.status} for ${url}`);
  return res.text();
}

export function toAbsoluteUrl(baseUrl: string, href: string) {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
