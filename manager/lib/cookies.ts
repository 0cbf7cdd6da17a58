/**
 * Session cookie helpers
 * The cookie is read straight from the Cookie header; there is no cookie middleware
 */

const SESSION_COOKIE = 'session_id';

/**
 * Extract a cookie value from a Cookie header
 * @returns Decoded value or null
 */
export function getCookie(cookieHeader: string | undefined, name: string = SESSION_COOKIE): string | null {
  if (!cookieHeader) return null;
  for (const part of cookieHeader.split(';')) {
    const eq = part.indexOf('=');
    if (eq < 0) continue;
    if (part.substring(0, eq).trim() !== name) continue;
    const raw = part.substring(eq + 1).trim();
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
  return null;
}

/** Set-Cookie value for a signed session id */
export function buildSessionCookie(value: string, maxAgeSeconds: number, secure = false): string {
  const attrs = [
    `${SESSION_COOKIE}=${value}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Strict',
    `Max-Age=${Math.floor(maxAgeSeconds)}`,
  ];
  if (secure) attrs.push('Secure');
  return attrs.join('; ');
}

export function clearSessionCookie(secure = false): string {
  return buildSessionCookie('', 0, secure);
}

export { SESSION_COOKIE };
