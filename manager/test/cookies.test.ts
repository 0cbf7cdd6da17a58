/**
 * Unit tests for session cookie signing and parsing
 */

import { signSessionId, verifySessionCookie } from '../lib/auth/token';
import { getCookie, buildSessionCookie, clearSessionCookie } from '../lib/cookies';

describe('session cookies', () => {
    describe('signSessionId / verifySessionCookie', () => {
        it('should verify a value it signed', () => {
            const cookie = signSessionId('session-1', 'test-secret');
            expect(cookie.startsWith('session-1.')).toBe(true);
            expect(verifySessionCookie(cookie, 'test-secret')).toBe('session-1');
        });

        it('should use SESSION_SECRET by default', () => {
            expect(verifySessionCookie(signSessionId('session-2'), 'test-secret')).toBe('session-2');
        });

        it('should reject a tampered session ID', () => {
            const signature = signSessionId('session-1', 'test-secret').split('.')[1];
            expect(verifySessionCookie(`session-9.${signature}`, 'test-secret')).toBeNull();
        });

        it('should reject a different secret', () => {
            const cookie = signSessionId('session-1', 'test-secret');
            expect(verifySessionCookie(cookie, 'other-secret')).toBeNull();
        });

        it('should reject malformed values', () => {
            expect(verifySessionCookie(undefined, 'test-secret')).toBeNull();
            expect(verifySessionCookie('', 'test-secret')).toBeNull();
            expect(verifySessionCookie('nodot', 'test-secret')).toBeNull();
            expect(verifySessionCookie('.signature', 'test-secret')).toBeNull();
            expect(verifySessionCookie('session-1.', 'test-secret')).toBeNull();
        });
    });

    describe('getCookie', () => {
        it('should find the session cookie among others', () => {
            expect(getCookie('a=1; session_id=abc.def; b=2')).toBe('abc.def');
        });

        it('should decode percent-encoded values', () => {
            expect(getCookie('session_id=a%20b')).toBe('a b');
        });

        it('should return the raw value when decoding fails', () => {
            expect(getCookie('session_id=%E0%A4%A')).toBe('%E0%A4%A');
        });

        it('should read other cookie names', () => {
            expect(getCookie('theme=dark; x=1', 'theme')).toBe('dark');
        });

        it('should return null when the cookie is absent', () => {
            expect(getCookie(undefined)).toBeNull();
            expect(getCookie('other=1')).toBeNull();
        });
    });

    describe('Set-Cookie values', () => {
        it('should build an HttpOnly strict cookie with whole-second Max-Age', () => {
            expect(buildSessionCookie('v', 3600.7))
                .toBe('session_id=v; Path=/; HttpOnly; SameSite=Strict; Max-Age=3600');
        });

        it('should add Secure over TLS', () => {
            expect(buildSessionCookie('v', 60, true))
                .toBe('session_id=v; Path=/; HttpOnly; SameSite=Strict; Max-Age=60; Secure');
        });

        it('should expire the cookie on clear', () => {
            expect(clearSessionCookie()).toBe('session_id=; Path=/; HttpOnly; SameSite=Strict; Max-Age=0');
        });
    });
});
