/**
 * Defang domains and URLs for safe display.
 * Prevents accidental clicks or resolution of reported indicators.
 *
 * Defanging is idempotent: dots already written as `[.]` and schemes
 * already written as `hxxp` are left alone.
 */

// A dot that is not already wrapped in brackets
const BARE_DOT = /(?<!\[)\.(?!\])/g;

// scheme://netloc, then path/query/fragment kept verbatim
const URL_PARTS = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/([^/?#]*)(.*)$/s;

/**
 * Defang a domain.
 * Examples:
 *   evil.com      → evil[.]com
 *   evil[.]com    → evil[.]com
 */
export function defangDomain(domain: string | null | undefined): string {
  if (!domain) return '';
  return domain.replace(BARE_DOT, '[.]');
}

/**
 * Defang a URL. Only the scheme and the network location change; path,
 * query and fragment are copied as they are.
 * Examples:
 *   https://evil.com/a.php?x=1.2 → hxxps://evil[.]com/a.php?x=1.2
 *   evil.com/login.html          → evil[.]com/login.html
 */
export function defangUrl(url: string | null | undefined): string {
  if (!url) return '';

  const match = URL_PARTS.exec(url);
  if (!match) {
    // No scheme: the leading segment is the host
    const cut = url.search(/[/?#]/);
    if (cut === -1) return defangDomain(url);
    return defangDomain(url.substring(0, cut)) + url.substring(cut);
  }

  const [, scheme, netloc, rest] = match;
  return `${defangScheme(scheme)}://${defangDomain(netloc)}${rest}`;
}

function defangScheme(scheme: string): string {
  return scheme.replace(/^http/i, 'hxxp');
}
