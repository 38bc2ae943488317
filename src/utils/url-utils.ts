/**
 * Host (with port) of a URL, or an empty string when it does not parse.
 * data: and blob: URLs have no host and land in the empty bucket too.
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/**
 * Lower-cased path of a URL without query or fragment. Relative or
 * unparseable input is cut at the first `?` or `#`.
 */
export function urlPath(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.split(/[?#]/)[0].toLowerCase();
  }
}
