export interface ParsedTarget {
  url: string;
  urlLower: string;
  host: string;
  path: string;
  query: URLSearchParams;
  valid: boolean;
}

function withScheme(url: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `http://${url}`;
}

/**
 * Splits a request URL into the pieces the rule tier and extractor look at. The host is
 * lowercased with any leading "www." removed. Unparseable input yields an empty host, which
 * every domain rule treats as unknown.
 */
export function parseTarget(url: string): ParsedTarget {
  const urlLower = url.toLowerCase();

  try {
    const parsed = new URL(withScheme(url.trim()));
    const hostname = parsed.hostname.toLowerCase();
    return {
      url,
      urlLower,
      host: hostname.startsWith('www.') ? hostname.slice(4) : hostname,
      path: parsed.pathname.toLowerCase(),
      query: parsed.searchParams,
      valid: hostname.length > 0
    };
  } catch {
    return { url, urlLower, host: '', path: '', query: new URLSearchParams(), valid: false };
  }
}

export function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}
