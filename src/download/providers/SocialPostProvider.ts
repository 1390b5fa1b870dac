/**
 * SocialPostProvider - Public Instagram posts, reels and IGTV
 * Post metadata comes from a PostExtractor; the media file is a direct GET of the resolved URL.
 */

import { BaseProvider, BaseProviderOptions, parseContentLength } from './BaseProvider';
import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import { ErrorKind, MediaRouteError } from '../core/errors';
import {
    FetchContext,
    ProviderCapabilities,
    RetrievedPayload,
} from '../core/types';
import {
    PostExtractionError,
    PostExtractionReason,
    PostExtractor,
    SocialPost,
} from '../extractors/types';

const SHORTCODE_SEGMENTS = new Set(['p', 'reel', 'reels', 'tv']);
const SHORTCODE_PATTERN = /^[A-Za-z0-9_-]+$/;

const KIND_BY_REASON: Record<PostExtractionReason, ErrorKind> = {
    private: ErrorKind.LoginRequired,
    login_required: ErrorKind.LoginRequired,
    not_found: ErrorKind.NotFound,
    bad_response: ErrorKind.ProviderUnavailable,
    connection: ErrorKind.NetworkError,
    cancelled: ErrorKind.Cancelled,
};

export interface SelectedMedia {
    url: string;
    isVideo: boolean;
}

export interface SocialPostProviderOptions extends BaseProviderOptions {
    retryDelayMs?: number;
}

export class SocialPostProvider extends BaseProvider {
    readonly id = 'social-post' as const;

    readonly capabilities: ProviderCapabilities = {
        handlesDomain: (host) => host.includes('instagram.com'),
        requiresCredential: false,
        supportsStreamingProbe: false,
    };

    private readonly extractor: PostExtractor;
    private readonly retryDelayMs: number;

    constructor(extractor: PostExtractor, options: SocialPostProviderOptions = {}) {
        super(options);
        this.extractor = extractor;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
    }

    async fetch(url: string, context: FetchContext): Promise<RetrievedPayload> {
        const shortcode = extractShortcode(url);
        if (!shortcode) {
            throw this.fail(ErrorKind.ParsingError, 'Invalid Instagram post/reel URL format');
        }

        logger.info(`[${this.id}] Fetching post`, { shortcode });
        const post = await this.lookup(shortcode, context);

        const media = selectMedia(post);
        if (!media) {
            throw this.fail(ErrorKind.NoArtifactProduced, 'Could not find media URL in the Instagram post');
        }

        const filename = buildPostFilename(post, media.isVideo);
        logger.info(`[${this.id}] Fetching ${media.isVideo ? 'video' : 'image'}`, { filename });

        const { response, scope } = await this.openResponse(
            media.url,
            { headers: { Referer: 'https://www.instagram.com/' } },
            context,
            this.downloadTimeout,
        );

        if (!response.ok) {
            scope.clear();
            this.discard(response);
            throw this.fail(ErrorKind.NetworkError, `HTTP ${response.status} downloading the media file`);
        }

        return {
            sourceProviderId: this.id,
            suggestedName: filename,
            declaredMime: media.isVideo ? 'video/mp4' : 'image/jpeg',
            sizeBytes: parseContentLength(response.headers.get('content-length')),
            body: this.toBoundedBody(response, scope, context, media.url),
        };
    }

    /**
     * Look up post metadata; a transient bad response is retried once
     */
    private async lookup(shortcode: string, context: FetchContext): Promise<SocialPost> {
        try {
            return await retryWithBackoff(
                () => this.extractor.getPost(shortcode, {
                    credential: context.credential,
                    signal: context.signal,
                }),
                1,
                this.retryDelayMs,
                `[${this.id}] post lookup`,
                (error) => error instanceof PostExtractionError && error.reason === 'bad_response',
                context.signal,
            );
        } catch (error) {
            if (context.signal?.aborted) {
                throw this.fail(ErrorKind.Cancelled, 'Download cancelled', { cause: error });
            }
            throw this.translate(error);
        }
    }

    private translate(error: unknown): MediaRouteError {
        if (error instanceof PostExtractionError) {
            return this.fail(KIND_BY_REASON[error.reason], error.message, { cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        return this.fail(ErrorKind.Unknown, `An unexpected error occurred with Instagram: ${message}`, {
            cause: error,
        });
    }
}

/**
 * Shortcode from /p/<code>, /reel/<code>, /reels/<code> or /tv/<code>
 */
export function extractShortcode(url: string): string | undefined {
    let segments: string[];
    try {
        segments = new URL(url).pathname.split('/').filter(Boolean);
    } catch {
        return undefined;
    }

    for (let i = 0; i < segments.length - 1; i++) {
        const segment = segments[i];
        const next = segments[i + 1];
        if (segment && next && SHORTCODE_SEGMENTS.has(segment.toLowerCase()) && SHORTCODE_PATTERN.test(next)) {
            return next;
        }
    }
    return undefined;
}

/**
 * Video posts: video URL, first carousel video, display image.
 * Photo posts: image URL, first carousel image.
 */
export function selectMedia(post: SocialPost): SelectedMedia | undefined {
    if (post.isVideo) {
        const videoUrl = post.videoUrl ?? post.carousel.find((item) => item.isVideo && item.videoUrl)?.videoUrl;
        if (videoUrl) return { url: videoUrl, isVideo: true };
        return post.imageUrl ? { url: post.imageUrl, isVideo: false } : undefined;
    }

    const imageUrl = post.imageUrl ?? post.carousel.find((item) => item.imageUrl)?.imageUrl;
    return imageUrl ? { url: imageUrl, isVideo: false } : undefined;
}

export function buildPostFilename(post: SocialPost, isVideo: boolean): string {
    const owner = post.ownerUsername || 'instagram';
    return `${owner}_${post.shortcode}_${formatDateUtc(post.takenAt)}.${isVideo ? 'mp4' : 'jpg'}`;
}

function formatDateUtc(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}${month}${day}`;
}
