/**
 * Extraction capabilities wrapped by the extractor-backed providers.
 * Their internals are third-party behaviour; providers only see these contracts.
 */

import type { CredentialBlob } from '../core/types';

// ============================================================================
// Social post extraction
// ============================================================================

export interface SocialMediaItem {
    isVideo: boolean;
    videoUrl?: string;
    imageUrl?: string;
}

export interface SocialPost extends SocialMediaItem {
    shortcode: string;
    ownerUsername?: string;
    takenAt: Date;
    carousel: SocialMediaItem[];
}

export interface PostLookupOptions {
    credential?: CredentialBlob;
    signal?: AbortSignal;
}

export interface PostExtractor {
    getPost(shortcode: string, options: PostLookupOptions): Promise<SocialPost>;
}

export type PostExtractionReason =
    | 'private'
    | 'login_required'
    | 'not_found'
    | 'bad_response'
    | 'connection'
    | 'cancelled';

export class PostExtractionError extends Error {
    readonly reason: PostExtractionReason;

    constructor(reason: PostExtractionReason, message: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'PostExtractionError';
        this.reason = reason;
    }
}

// ============================================================================
// Generic video extraction
// ============================================================================

export interface VideoProbe {
    title: string;
    extension: string;
    sizeBytes?: number;
}

export interface VideoExtractorOptions {
    cookiesPath?: string;
    signal?: AbortSignal;
    timeoutMs: number;
    maxBytes?: number;
}

export interface VideoExtractor {
    /**
     * Resolve the best video+audio pair and its approximate size without downloading
     */
    probe(url: string, options: VideoExtractorOptions): Promise<VideoProbe>;

    /**
     * Download (and merge) into outputTemplate; resolves with the tool's log output
     * once it exits. A skipped download leaves no file behind.
     */
    download(url: string, outputTemplate: string, options: VideoExtractorOptions): Promise<string>;
}

export class ExtractorError extends Error {
    readonly exitCode?: number | null;
    readonly killed: boolean;
    readonly timedOut: boolean;

    constructor(
        message: string,
        options: { exitCode?: number | null; killed?: boolean; timedOut?: boolean; cause?: unknown } = {},
    ) {
        super(message, { cause: options.cause });
        this.name = 'ExtractorError';
        this.exitCode = options.exitCode;
        this.killed = options.killed ?? false;
        this.timedOut = options.timedOut ?? false;
    }
}
