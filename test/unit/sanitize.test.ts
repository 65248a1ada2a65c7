/**
 * Tests for URL checks (src/utils/sanitize.ts).
 */

import { describe, expect, it } from 'vitest';
import { InvalidUrlError } from '../../src/utils/errors.js';
import { isDomainAllowed, sanitizeUrl } from '../../src/utils/sanitize.js';

describe('sanitizeUrl', () => {
  it('normalizes http and https URLs', () => {
    expect(sanitizeUrl('  https://Example.com/a?b=1 ')).toBe('https://example.com/a?b=1');
    expect(sanitizeUrl('http://localhost:8080')).toBe('http://localhost:8080/');
  });

  it.each([
    ['javascript:alert(1)', 'Blocked URL protocol: javascript:'],
    ['data:text/html,hi', 'Blocked URL protocol: data:'],
    ['file:///etc/passwd', 'Blocked URL protocol: file:'],
    ['ftp://example.com', 'Only http and https URLs are allowed, got: ftp:'],
    ['not a url', 'Invalid URL: not a url'],
    ['   ', 'URL must not be empty'],
  ])('rejects %s', (input, message) => {
    expect(() => sanitizeUrl(input)).toThrow(new InvalidUrlError(message));
  });
});

describe('isDomainAllowed', () => {
  it('admits everything with an empty allowlist', () => {
    expect(isDomainAllowed('https://anything.test/', [])).toBe(true);
  });

  it('matches exact hosts and subdomains', () => {
    const allowed = ['example.com'];
    expect(isDomainAllowed('https://example.com/', allowed)).toBe(true);
    expect(isDomainAllowed('https://www.example.com/', allowed)).toBe(true);
    expect(isDomainAllowed('https://badexample.com/', allowed)).toBe(false);
    expect(isDomainAllowed('https://example.org/', allowed)).toBe(false);
  });
});
