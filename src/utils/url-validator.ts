/**
 * URL checks for profile and detail-page links. Only web protocols reach the browser.
 */

export type UrlCheck = { valid: true; parsed: URL } | { valid: false; reason: string };

const ALLOWED_PROTOCOLS = ['http:', 'https:'];

function checkProtocol(parsed: URL): UrlCheck {
  if (!ALLOWED_PROTOCOLS.includes(parsed.protocol)) {
    return { valid: false, reason: `Protocol not allowed: ${parsed.protocol} (only http/https)` };
  }
  return { valid: true, parsed };
}

export function validateUrl(url: string): UrlCheck {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, reason: 'Invalid URL format' };
  }
  return checkProtocol(parsed);
}

/** Resolves a possibly relative href (as found in a row) against the listing page URL. */
export function resolvePortalUrl(href: string, baseUrl: string): UrlCheck {
  let parsed: URL;
  try {
    parsed = new URL(href, baseUrl);
  } catch {
    return { valid: false, reason: `Cannot resolve ${href} against ${baseUrl}` };
  }
  return checkProtocol(parsed);
}
