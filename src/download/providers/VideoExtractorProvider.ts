/**
 * VideoExtractorProvider - Sites handled by a general-purpose extractor (yt-dlp)
 * Two phases: a metadata-only probe, then a download into a scoped temp directory
 * where separate video/audio streams are merged into one container.
 */

import path from 'path';
import { Readable } from 'stream';
import { BaseProvider, BaseProviderOptions } from './BaseProvider';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { ErrorKind, MediaRouteError, truncateCause } from '../core/errors';
import { sanitize } from '../security/FileSanitizer';
import { isKnownVideoHost } from '../core/UrlClassifier';
import {
    FetchContext,
    ProbeResult,
    ProviderCapabilities,
    RetrievedPayload,
} from '../core/types';
import { MAX_FILESIZE_SKIPPED } from '../extractors/YtDlpExtractor';
import { ExtractorError, VideoExtractor, VideoExtractorOptions, VideoProbe } from '../extractors/types';

export interface ClassifiedFailure {
    kind: ErrorKind;
    message: string;
    recoverable?: boolean;
}

/**
 * The one place extractor output is turned into an ErrorKind
 */
export function classifyExtractorFailure(text: string, credentialSupplied: boolean): ClassifiedFailure {
    const lower = text.toLowerCase();

    if (lower.includes('unsupported url')) {
        return { kind: ErrorKind.UnsupportedURL, message: 'Unsupported URL for the video extractor' };
    }

    if (lower.includes('http error 403')) {
        return credentialSupplied
            ? {
                kind: ErrorKind.AccessDenied,
                message: 'Access denied (HTTP 403). Authentication via cookies failed or was insufficient',
            }
            : {
                kind: ErrorKind.AccessDenied,
                message: 'Access denied (HTTP 403). No cookies were supplied; the video may require login',
                recoverable: true,
            };
    }

    if (
        lower.includes('login required') ||
        lower.includes('confirm your age') ||
        lower.includes('sign in to confirm') ||
        lower.includes('video is private') ||
        lower.includes('age-restricted')
    ) {
        return {
            kind: ErrorKind.LoginRequired,
            message: credentialSupplied
                ? 'Login/age check failed even with cookies. Cookies might be expired or invalid'
                : 'This content requires login/age verification (cookies needed)',
        };
    }

    if (
        lower.includes('http error 404') ||
        lower.includes('video unavailable') ||
        lower.includes('does not exist')
    ) {
        return { kind: ErrorKind.NotFound, message: 'The video was not found' };
    }

    return { kind: ErrorKind.Unknown, message: `Video extractor error: ${truncateCause(text, 150)}` };
}

export interface VideoExtractorProviderOptions extends BaseProviderOptions {
    fileManager: FileManager;
}

export class VideoExtractorProvider extends BaseProvider {
    readonly id = 'video-extractor' as const;

    readonly capabilities: ProviderCapabilities = {
        handlesDomain: isKnownVideoHost,
        requiresCredential: false,
        supportsStreamingProbe: true,
    };

    private readonly extractor: VideoExtractor;
    private readonly fileManager: FileManager;

    constructor(extractor: VideoExtractor, options: VideoExtractorProviderOptions) {
        super(options);
        this.extractor = extractor;
        this.fileManager = options.fileManager;
    }

    async probe(url: string, context: FetchContext): Promise<ProbeResult> {
        const info = await this.inspect(url, context);
        return { sizeBytes: info.sizeBytes, suggestedName: filenameHint(info) };
    }

    async fetch(url: string, context: FetchContext): Promise<RetrievedPayload> {
        const info = await this.inspect(url, context);
        const maxBytes = context.maxBytes;

        if (maxBytes !== undefined && info.sizeBytes !== undefined && info.sizeBytes > maxBytes) {
            throw this.fail(
                ErrorKind.PayloadTooLarge,
                `Estimated size ${info.sizeBytes} bytes exceeds the ${maxBytes} byte limit`,
            );
        }

        const hint = filenameHint(info);
        logger.info(`[${this.id}] Downloading`, { url, hint, sizeBytes: info.sizeBytes });

        const { filename, bytes } = await this.fileManager.withTempDir('extract', async (dir) => {
            const baseName = sanitize(path.parse(hint).name);
            const outputTemplate = path.join(dir, `${baseName}.%(ext)s`);

            let output: string;
            try {
                output = await this.extractor.download(url, outputTemplate, this.extractorOptions(context));
            } catch (error) {
                throw this.translate(error, context);
            }

            if (maxBytes !== undefined && MAX_FILESIZE_SKIPPED.test(output)) {
                throw this.fail(
                    ErrorKind.PayloadTooLarge,
                    `Video is larger than the ${maxBytes} byte limit`,
                );
            }

            const files = await this.fileManager.listFiles(dir);
            const produced = files[0];
            if (!produced) {
                throw this.fail(ErrorKind.NoArtifactProduced, 'Download failed (no file generated)');
            }

            const filePath = path.join(dir, produced);
            const size = await this.fileManager.getFileSize(filePath);
            if (maxBytes !== undefined && size > maxBytes) {
                throw this.fail(
                    ErrorKind.PayloadTooLarge,
                    `Downloaded file is ${size} bytes, which exceeds the ${maxBytes} byte limit`,
                );
            }

            return { filename: produced, bytes: await this.fileManager.readFile(filePath) };
        });

        return {
            sourceProviderId: this.id,
            suggestedName: filename,
            sizeBytes: bytes.length,
            body: Readable.from([bytes]),
        };
    }

    /**
     * Phase (a): metadata only, no bytes transferred
     */
    private async inspect(url: string, context: FetchContext): Promise<VideoProbe> {
        this.ensureNotAborted(context);
        try {
            return await this.extractor.probe(url, {
                ...this.extractorOptions(context),
                timeoutMs: this.requestTimeout,
            });
        } catch (error) {
            throw this.translate(error, context);
        }
    }

    private extractorOptions(context: FetchContext): VideoExtractorOptions {
        return {
            cookiesPath: context.credential?.path,
            signal: context.signal,
            timeoutMs: this.downloadTimeout,
            maxBytes: context.maxBytes,
        };
    }

    private translate(error: unknown, context: FetchContext): MediaRouteError {
        if (error instanceof MediaRouteError) return error;

        if (context.signal?.aborted) {
            return this.fail(ErrorKind.Cancelled, 'Download cancelled', { cause: error });
        }

        if (error instanceof ExtractorError && error.timedOut) {
            return this.fail(ErrorKind.NetworkError, error.message, { cause: error });
        }

        const text = error instanceof Error ? error.message : String(error);
        const classified = classifyExtractorFailure(text, context.credential !== undefined);
        logger.warn(`[${this.id}] Extractor failed`, { kind: classified.kind, detail: truncateCause(text) });

        return this.fail(classified.kind, classified.message, {
            recoverable: classified.recoverable,
            cause: error,
        });
    }
}

function filenameHint(info: VideoProbe): string {
    return sanitize(`${info.title}.${info.extension}`);
}
