/**
 * InstagramPostExtractor - Post metadata from Instagram's public web JSON endpoint
 * Understands both the current "items" shape and the older "graphql.shortcode_media" shape.
 */

import { z } from 'zod';
import { logger } from '../../utils/logger';
import { createScopedSignal } from '../../utils/abort';
import { cookieHeaderFor } from '../../utils/CookiesManager';
import { DEFAULT_USER_AGENT } from '../../utils/config';
import { FetchImpl } from '../core/types';
import {
    PostExtractionError,
    PostExtractor,
    PostLookupOptions,
    SocialMediaItem,
    SocialPost,
} from './types';

const INSTAGRAM_WEB_APP_ID = '936619743392459';

const CandidateList = z.array(z.object({ url: z.string() })).optional();

const ItemMediaSchema = z.object({
    media_type: z.number().optional(),
    video_versions: CandidateList,
    image_versions2: z.object({ candidates: CandidateList }).optional(),
});

const ItemSchema = ItemMediaSchema.extend({
    code: z.string().optional(),
    taken_at: z.number().optional(),
    user: z
        .object({
            username: z.string().optional(),
            is_private: z.boolean().optional(),
        })
        .optional(),
    carousel_media: z.array(ItemMediaSchema).optional(),
});

const GraphNodeSchema = z.object({
    is_video: z.boolean().optional(),
    video_url: z.string().nullish(),
    display_url: z.string().nullish(),
});

const GraphMediaSchema = GraphNodeSchema.extend({
    taken_at_timestamp: z.number().optional(),
    owner: z.object({ username: z.string().optional(), is_private: z.boolean().optional() }).optional(),
    edge_sidecar_to_children: z
        .object({ edges: z.array(z.object({ node: GraphNodeSchema })) })
        .optional(),
});

const PostResponseSchema = z.object({
    items: z.array(ItemSchema).optional(),
    graphql: z.object({ shortcode_media: GraphMediaSchema.nullish() }).optional(),
    require_login: z.boolean().optional(),
});

type PostItem = z.infer<typeof ItemSchema>;
type ItemMedia = z.infer<typeof ItemMediaSchema>;
type GraphMedia = z.infer<typeof GraphMediaSchema>;

export interface InstagramPostExtractorOptions {
    fetchImpl?: FetchImpl;
    timeoutMs?: number;
    userAgent?: string;
    baseUrl?: string;
}

export class InstagramPostExtractor implements PostExtractor {
    private readonly fetchImpl: FetchImpl;
    private readonly timeoutMs: number;
    private readonly userAgent: string;
    private readonly baseUrl: string;

    constructor(options: InstagramPostExtractorOptions = {}) {
        this.fetchImpl = options.fetchImpl || fetch;
        this.timeoutMs = options.timeoutMs || 15000;
        this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
        this.baseUrl = options.baseUrl || 'https://www.instagram.com';
    }

    async getPost(shortcode: string, options: PostLookupOptions): Promise<SocialPost> {
        const url = `${this.baseUrl}/p/${encodeURIComponent(shortcode)}/?__a=1&__d=dis`;
        const body = await this.requestJson(url, options);

        const parsed = PostResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new PostExtractionError('bad_response', 'Unexpected response shape from Instagram', {
                cause: parsed.error,
            });
        }

        if (parsed.data.require_login) {
            throw new PostExtractionError('login_required', 'Login required to access this content');
        }

        const item = parsed.data.items?.[0];
        if (item) return toPostFromItem(shortcode, item);

        const media = parsed.data.graphql?.shortcode_media;
        if (media) return toPostFromGraph(shortcode, media);

        throw new PostExtractionError('not_found', `Instagram post ${shortcode} not found`);
    }

    private async requestJson(url: string, options: PostLookupOptions): Promise<unknown> {
        const scope = createScopedSignal(this.timeoutMs, options.signal);
        const headers: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            'X-IG-App-ID': INSTAGRAM_WEB_APP_ID,
        };

        const cookie = cookieHeaderFor(options.credential, new URL(url).hostname);
        if (cookie) headers.Cookie = cookie;

        try {
            const response = await this.fetchImpl(url, { headers, signal: scope.signal });
            this.assertStatus(response);

            const contentType = (response.headers.get('content-type') || '').toLowerCase();
            if (contentType.includes('text/html')) {
                // Instagram serves its login wall as HTML instead of JSON
                throw new PostExtractionError('login_required', 'Login required to access this content');
            }

            const text = await response.text();
            try {
                return JSON.parse(text);
            } catch (error) {
                throw new PostExtractionError('bad_response', 'Instagram returned a malformed response', {
                    cause: error,
                });
            }
        } catch (error) {
            if (error instanceof PostExtractionError) throw error;
            if (options.signal?.aborted) {
                throw new PostExtractionError('cancelled', 'Request cancelled', { cause: error });
            }
            const message = scope.timedOut()
                ? `Instagram did not respond within ${this.timeoutMs}ms`
                : `Connection error with Instagram: ${error instanceof Error ? error.message : String(error)}`;
            logger.debug('Instagram request failed', { url, message });
            throw new PostExtractionError('connection', message, { cause: error });
        } finally {
            scope.clear();
        }
    }

    private assertStatus(response: Response): void {
        if (response.url.includes('/accounts/login')) {
            throw new PostExtractionError('login_required', 'Login required to access this content');
        }
        if (response.status === 404) {
            throw new PostExtractionError('not_found', 'Instagram post not found (404)');
        }
        if (response.status === 401 || response.status === 403) {
            throw new PostExtractionError('login_required', `Instagram refused access (HTTP ${response.status})`);
        }
        if (!response.ok) {
            throw new PostExtractionError('bad_response', `Instagram returned HTTP ${response.status}`);
        }
    }
}

function firstUrl(list: { url: string }[] | undefined): string | undefined {
    return list?.[0]?.url;
}

function toMediaItem(media: ItemMedia): SocialMediaItem {
    return {
        isVideo: media.media_type === 2 || (media.video_versions?.length ?? 0) > 0,
        videoUrl: firstUrl(media.video_versions),
        imageUrl: firstUrl(media.image_versions2?.candidates),
    };
}

function toPostFromItem(shortcode: string, item: PostItem): SocialPost {
    const carousel = (item.carousel_media || []).map(toMediaItem);
    const own = toMediaItem(item);
    // Carousel posts (media_type 8) carry media only in their children
    const isVideo = item.media_type === 8 ? carousel[0]?.isVideo ?? false : own.isVideo;

    if (item.user?.is_private && !own.videoUrl && !own.imageUrl && carousel.length === 0) {
        throw new PostExtractionError('private', 'Profile is private or requires login');
    }

    return {
        shortcode: item.code || shortcode,
        ownerUsername: item.user?.username,
        takenAt: new Date((item.taken_at ?? 0) * 1000),
        isVideo,
        videoUrl: own.videoUrl,
        imageUrl: own.imageUrl,
        carousel,
    };
}

function toPostFromGraph(shortcode: string, media: GraphMedia): SocialPost {
    const carousel = (media.edge_sidecar_to_children?.edges || []).map(({ node }) => ({
        isVideo: node.is_video ?? false,
        videoUrl: node.video_url || undefined,
        imageUrl: node.display_url || undefined,
    }));

    return {
        shortcode,
        ownerUsername: media.owner?.username,
        takenAt: new Date((media.taken_at_timestamp ?? 0) * 1000),
        isVideo: media.is_video ?? false,
        videoUrl: media.video_url || undefined,
        imageUrl: media.display_url || undefined,
        carousel,
    };
}
