/**
 * UrlClassifier - Maps a URL to the ordered list of providers that should try it
 * Pure: no network access, same input always gives the same candidates.
 */

import { ErrorKind, MediaRouteError } from './errors';
import { GENERIC_HTTP, ProviderCandidate, ProviderId } from './types';

export const PRIMARY_PRIORITY = 2;
export const FALLBACK_PRIORITY = 1;

export const KNOWN_VIDEO_DOMAINS: readonly string[] = [
    'youtube.com',
    'youtu.be',
    'youtube-nocookie.com',
    'facebook.com',
    'fb.watch',
    'fb.com',
    'twitter.com',
    'x.com',
    'vimeo.com',
    'dailymotion.com',
    'dai.ly',
    'soundcloud.com',
    'twitch.tv',
    'bandcamp.com',
    'bilibili.com',
    'b23.tv',
    'reddit.com',
    'v.redd.it',
    'streamable.com',
    'rumble.com',
    'odysee.com',
    'mixcloud.com',
    'vk.com',
];

interface ClassifierRule {
    matches(host: string): boolean;
    primary: ProviderId;
    // Whether a plain HTTP GET is worth trying after the primary provider
    fallback: boolean;
}

export function isKnownVideoHost(host: string): boolean {
    return KNOWN_VIDEO_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

// Evaluated in order; first match wins
const RULES: readonly ClassifierRule[] = [
    { matches: (host) => host.includes('drive.google.com'), primary: 'google-drive', fallback: false },
    { matches: (host) => host.includes('instagram.com'), primary: 'social-post', fallback: false },
    { matches: (host) => host.includes('tiktok.com'), primary: 'short-video-api', fallback: true },
    { matches: isKnownVideoHost, primary: 'video-extractor', fallback: true },
];

export function normalizeHost(host: string): string {
    const lower = host.toLowerCase();
    return lower.startsWith('www.') ? lower.slice(4) : lower;
}

export function classifyHost(host: string): readonly ProviderCandidate[] {
    const normalized = normalizeHost(host);
    const rule = RULES.find((candidate) => candidate.matches(normalized));

    if (!rule) {
        return freeze([{ providerId: GENERIC_HTTP, priority: PRIMARY_PRIORITY }]);
    }

    const candidates: ProviderCandidate[] = [{ providerId: rule.primary, priority: PRIMARY_PRIORITY }];
    if (rule.fallback) {
        candidates.push({ providerId: GENERIC_HTTP, priority: FALLBACK_PRIORITY });
    }
    return freeze(candidates);
}

/**
 * @throws MediaRouteError(InvalidURL) for anything that is not an absolute http(s) URL
 */
export function classify(url: string): readonly ProviderCandidate[] {
    const trimmed = url.trim();
    if (!/^https?:\/\//i.test(trimmed)) {
        throw new MediaRouteError(ErrorKind.InvalidURL, 'Invalid URL: only http:// and https:// links are supported');
    }

    let host: string;
    try {
        host = new URL(trimmed).hostname;
    } catch (error) {
        throw new MediaRouteError(ErrorKind.InvalidURL, `Invalid URL: ${trimmed}`, { cause: error });
    }

    if (!host) {
        throw new MediaRouteError(ErrorKind.InvalidURL, `Invalid URL: ${trimmed}`);
    }

    return classifyHost(host);
}

function freeze(candidates: ProviderCandidate[]): readonly ProviderCandidate[] {
    candidates.forEach((candidate) => Object.freeze(candidate));
    return Object.freeze(candidates);
}
