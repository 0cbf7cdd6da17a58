/**
 * Session cookie signing
 * Cookie value format: <session id>.<base64url HMAC-SHA256 of the id>
 */

import crypto from 'crypto';
import { assertSessionSecret } from '../../config';

function sign(value: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(value).digest('base64url');
}

function signSessionId(sessionId: string, secret: string = assertSessionSecret()): string {
  return `${sessionId}.${sign(sessionId, secret)}`;
}

/**
 * Verify a signed cookie value
 * @returns The session ID, or null when the signature does not match
 */
function verifySessionCookie(value: string | undefined | null, secret: string = assertSessionSecret()): string | null {
  if (!value) return null;

  const dot = value.lastIndexOf('.');
  if (dot <= 0 || dot === value.length - 1) return null;
  const sessionId = value.substring(0, dot);
  const signature = value.substring(dot + 1);

  const expected = Buffer.from(sign(sessionId, secret), 'utf8');
  const actual = Buffer.from(signature, 'utf8');
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    return null;
  }
  return sessionId;
}

export { signSessionId, verifySessionCookie };
