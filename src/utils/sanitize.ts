import { InvalidUrlError } from './errors.js';

const BLOCKED_PROTOCOLS = ['javascript:', 'data:', 'file:', 'vbscript:'];

export function sanitizeUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed === '') {
    throw new InvalidUrlError('URL must not be empty');
  }

  const lower = trimmed.toLowerCase();
  for (const protocol of BLOCKED_PROTOCOLS) {
    if (lower.startsWith(protocol)) {
      throw new InvalidUrlError(`Blocked URL protocol: ${protocol}`);
    }
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new InvalidUrlError(`Invalid URL: ${trimmed}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidUrlError(`Only http and https URLs are allowed, got: ${parsed.protocol}`);
  }

  return parsed.href;
}

/**
 * Exact or subdomain match against an allowlist ("example.com" admits
 * "www.example.com"). An empty allowlist admits every host.
 */
export function isDomainAllowed(url: string, allowedDomains: readonly string[]): boolean {
  if (allowedDomains.length === 0) return true;

  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    return false;
  }

  return allowedDomains.some((domain) => hostname === domain || hostname.endsWith(`.${domain}`));
}
