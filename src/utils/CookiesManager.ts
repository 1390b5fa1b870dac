import fs from 'fs';
import path from 'path';
import { logger } from './logger';
import { Cookie, CredentialBlob } from '../download/core/types';

/**
 * CookiesManager - Loads the Netscape cookie jar once at startup
 *
 * Sources, in order:
 * - COOKIES: cookie file content (base64 or plaintext), written to the temp directory for yt-dlp
 * - COOKIES_FILE: path to an existing cookies.txt
 *
 * The resulting CredentialBlob is frozen and shared read-only for the process lifetime.
 */
export interface CookiesManagerOptions {
  cookiesFile: string;
  cookiesContent?: string;
  tempDirectory: string;
}

const HTTP_ONLY_PREFIX = '#HttpOnly_';

export class CookiesManager {
  private readonly options: CookiesManagerOptions;

  constructor(options: CookiesManagerOptions) {
    this.options = options;
  }

  /**
   * Load the credential blob; undefined when no cookies are configured
   */
  load(): CredentialBlob | undefined {
    const cookiesPath = this.options.cookiesContent
      ? this.writeInlineCookies(this.options.cookiesContent)
      : this.options.cookiesFile;

    if (!cookiesPath || !fs.existsSync(cookiesPath)) {
      logger.info('No cookie file found, continuing unauthenticated', {
        path: cookiesPath,
      });
      return undefined;
    }

    const content = fs.readFileSync(cookiesPath, 'utf-8');
    const cookies = parseNetscapeCookies(content);

    logger.info('Cookies loaded', {
      path: cookiesPath,
      count: cookies.length,
      domains: Array.from(new Set(cookies.map((c) => c.domain))).length,
    });

    return Object.freeze({
      path: path.resolve(cookiesPath),
      cookies: Object.freeze(cookies.map((c) => Object.freeze(c))),
    });
  }

  /**
   * Write inline cookie content to a file so yt-dlp can read it
   */
  private writeInlineCookies(cookiesContent: string): string {
    fs.mkdirSync(this.options.tempDirectory, { recursive: true });
    const cookiesPath = path.join(this.options.tempDirectory, 'cookies.txt');
    fs.writeFileSync(cookiesPath, decodeCookiesContent(cookiesContent), {
      encoding: 'utf-8',
      mode: 0o600,
    });
    return cookiesPath;
  }
}

/**
 * Decode content that may be base64 or plaintext
 */
export function decodeCookiesContent(cookiesContent: string): string {
  // Netscape files are tab separated; anything with a tab is already plaintext
  if (cookiesContent.includes('\t')) {
    return cookiesContent;
  }
  const decoded = Buffer.from(cookiesContent.trim(), 'base64').toString('utf-8');
  return decoded.includes('\t') ? decoded : cookiesContent;
}

/**
 * Parse Netscape cookie file format, skipping comments and malformed lines
 */
export function parseNetscapeCookies(content: string): Cookie[] {
  const cookies: Cookie[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      line = line.substring(HTTP_ONLY_PREFIX.length);
    } else if (line.startsWith('#')) {
      continue;
    }

    const fields = line.split('\t');
    if (fields.length < 7) continue;

    const [domain, includeSubdomains, cookiePath, secure, expires, name, ...valueParts] = fields;
    const expiresAt = Number(expires);
    if (!domain || !name || !Number.isFinite(expiresAt)) continue;

    cookies.push({
      domain: domain.toLowerCase(),
      includeSubdomains: includeSubdomains?.toUpperCase() === 'TRUE',
      path: cookiePath || '/',
      secure: secure?.toUpperCase() === 'TRUE',
      expires: expiresAt,
      name,
      value: valueParts.join('\t'),
    });
  }

  return cookies;
}

/**
 * Build a Cookie header for a host from the jar (expired cookies skipped)
 */
export function cookieHeaderFor(
  credential: CredentialBlob | undefined,
  host: string,
  now: number = Date.now(),
): string | undefined {
  if (!credential) return undefined;

  const hostname = host.toLowerCase();
  const pairs = credential.cookies
    .filter((cookie) => {
      if (cookie.expires > 0 && cookie.expires * 1000 < now) return false;
      const domain = cookie.domain.replace(/^\./, '');
      return hostname === domain || hostname.endsWith(`.${domain}`);
    })
    .map((cookie) => `${cookie.name}=${cookie.value}`);

  return pairs.length > 0 ? pairs.join('; ') : undefined;
}
