/**
 * ShortVideoApiProvider - TikTok downloads through the tikwm.com resolution API
 * The API returns a JSON envelope with a playable URL; the media itself is a second GET.
 */

import { z } from 'zod';
import { BaseProvider, BaseProviderOptions, parseContentLength } from './BaseProvider';
import { logger } from '../../utils/logger';
import { ErrorKind } from '../core/errors';
import { normalizeMime } from '../security/mimeTypes';
import {
    FetchContext,
    ProviderCapabilities,
    RetrievedPayload,
} from '../core/types';

export const DEFAULT_SHORT_VIDEO_API = 'https://www.tikwm.com/api/';

const EnvelopeSchema = z.object({
    code: z.number(),
    msg: z.string().optional(),
    data: z
        .object({
            play: z.string().optional(),
            hdplay: z.string().optional(),
            title: z.string().optional(),
            size: z.number().optional(),
            author: z
                .object({
                    unique_id: z.string().optional(),
                    nickname: z.string().optional(),
                })
                .optional(),
        })
        .nullish(),
});

export type ShortVideoEnvelope = z.infer<typeof EnvelopeSchema>;

export interface ShortVideoApiProviderOptions extends BaseProviderOptions {
    apiUrl?: string;
}

export class ShortVideoApiProvider extends BaseProvider {
    readonly id = 'short-video-api' as const;

    readonly capabilities: ProviderCapabilities = {
        handlesDomain: (host) => host.includes('tiktok.com'),
        requiresCredential: false,
        supportsStreamingProbe: false,
    };

    private readonly apiUrl: string;

    constructor(options: ShortVideoApiProviderOptions = {}) {
        super(options);
        this.apiUrl = options.apiUrl || DEFAULT_SHORT_VIDEO_API;
    }

    async fetch(url: string, context: FetchContext): Promise<RetrievedPayload> {
        const envelope = await this.resolve(url, context);
        const data = envelope.data;
        const playUrl = data?.play;

        if (envelope.code !== 0 || !playUrl) {
            throw this.fail(
                ErrorKind.ProviderRejected,
                `TikTok download failed (API: ${new URL(this.apiUrl).host}): ${envelope.msg || 'Unknown API error'}`,
            );
        }

        const author = data?.author?.unique_id || 'user';
        const title = data?.title || 'tiktok_video';
        const filename = `${author}_${title}.mp4`;

        if (context.maxBytes !== undefined && data?.size !== undefined && data.size > context.maxBytes) {
            throw this.fail(
                ErrorKind.PayloadTooLarge,
                `File is ${data.size} bytes, which exceeds the ${context.maxBytes} byte limit`,
            );
        }

        logger.info(`[${this.id}] Fetching resolved video`, { filename });

        const { response, scope } = await this.openResponse(
            playUrl,
            { headers: { Referer: 'https://www.tiktok.com/' } },
            context,
            this.downloadTimeout,
        );

        if (!response.ok) {
            scope.clear();
            this.discard(response);
            throw this.fail(ErrorKind.NetworkError, `HTTP ${response.status} fetching resolved TikTok video`);
        }

        // Block and error pages arrive as 200 with a document type
        const contentType = normalizeMime(response.headers.get('content-type') || '');
        if (isDocumentMime(contentType)) {
            scope.clear();
            this.discard(response);
            throw this.fail(
                ErrorKind.ProviderRejected,
                `TikTok video URL returned ${contentType} instead of a video`,
            );
        }

        return {
            sourceProviderId: this.id,
            suggestedName: filename,
            declaredMime: 'video/mp4',
            sizeBytes: parseContentLength(response.headers.get('content-length')) ?? data?.size,
            body: this.toBoundedBody(response, scope, context, playUrl),
        };
    }

    /**
     * Call the resolution API and validate its envelope
     */
    private async resolve(url: string, context: FetchContext): Promise<ShortVideoEnvelope> {
        const apiUrl = `${this.apiUrl}?url=${encodeURIComponent(url)}`;
        logger.info(`[${this.id}] Resolving via API`, { url });

        const { response, text } = await this.requestText(
            apiUrl,
            { headers: { Accept: 'application/json' } },
            context,
        );

        if (!response.ok) {
            throw this.fail(ErrorKind.NetworkError, `TikTok API returned HTTP ${response.status}`);
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (error) {
            throw this.fail(ErrorKind.ParsingError, 'Error reading response from TikTok service', {
                recoverable: true,
                cause: error,
            });
        }

        const parsed = EnvelopeSchema.safeParse(json);
        if (!parsed.success) {
            throw this.fail(ErrorKind.ParsingError, 'Unexpected response shape from TikTok service', {
                recoverable: true,
                cause: parsed.error,
            });
        }

        return parsed.data;
    }
}

function isDocumentMime(mimeType: string): boolean {
    return mimeType.startsWith('text/') || mimeType === 'application/json';
}
