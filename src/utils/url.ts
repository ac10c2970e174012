/**
 * URL helpers shared by the registry, the sessions and the cache
 */

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return '';
  }
}

/**
 * Registrable domain as the last two DNS labels of the host
 *
 * `https://www.sky.com/broadband` gives `sky.com`; a bare host with fewer
 * labels is returned whole.
 */
export function domainKey(url: string): string {
  const host = hostnameOf(url);
  const parts = host.split('.');
  if (parts.length >= 2) {
    return parts.slice(-2).join('.');
  }
  return host;
}

/**
 * Provider name used in rows and status events: the host without `www.`
 */
export function providerOf(url: string): string {
  return hostnameOf(url).replace(/^www\./, '');
}

/**
 * `https://<host>` for a URL, with no trailing slash
 */
export function hostOrigin(url: string): string {
  return `https://${hostnameOf(url)}`;
}

/**
 * Path of a URL, or '' when it does not parse
 */
export function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return '';
  }
}

/**
 * Prefix `https://` when the operator left the scheme off
 */
export function withScheme(url: string): string {
  return url.startsWith('http') ? url : `https://${url}`;
}
