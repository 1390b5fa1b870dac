/**
 * ResultAssembler - Normalizes provider output into the uniform result contract
 * Success: RetrievedPayload -> MediaArtifact / MediaStream. Failure: anything thrown -> ErrorReport.
 */

import { ErrorKind, ErrorReport, MediaRouteError, toMediaRouteError } from './errors';
import { MediaArtifact, MediaStream, ProviderId, RetrievedPayload } from './types';
import { getExtension, sanitize } from '../security/FileSanitizer';
import {
    DEFAULT_MIME,
    getExtensionFromMime,
    getMimeFamily,
    getMimeFromExtension,
    normalizeMime,
} from '../security/mimeTypes';

export interface ResultAssemblerOptions {
    maxBytes?: number;
}

export interface ArtifactDescription {
    filename: string;
    mimeType: string;
}

export class ResultAssembler {
    private readonly maxBytes?: number;

    constructor(options: ResultAssemblerOptions = {}) {
        this.maxBytes = options.maxBytes;
    }

    /**
     * Sanitized filename and resolved MIME type.
     * Declared MIME beats the extension table; the filename is given an extension
     * that agrees with a declared MIME's family.
     */
    describe(payload: Pick<RetrievedPayload, 'suggestedName' | 'declaredMime'>): ArtifactDescription {
        let filename = sanitize(payload.suggestedName);
        const declared = payload.declaredMime ? normalizeMime(payload.declaredMime) : '';

        if (!declared || declared === DEFAULT_MIME) {
            return {
                filename,
                mimeType: getMimeFromExtension(getExtension(filename)) || DEFAULT_MIME,
            };
        }

        const canonicalExtension = getExtensionFromMime(declared);
        if (canonicalExtension) {
            const currentMime = getMimeFromExtension(getExtension(filename));
            if (!currentMime || getMimeFamily(currentMime) !== getMimeFamily(declared)) {
                filename = sanitize(`${filename}.${canonicalExtension}`);
            }
        }

        return { filename, mimeType: declared };
    }

    /**
     * Drain the payload into memory. The body is destroyed on any failure.
     */
    async assemble(payload: RetrievedPayload): Promise<MediaArtifact> {
        const { filename, mimeType } = this.describe(payload);
        const { body, sourceProviderId } = payload;

        try {
            this.checkDeclaredSize(payload);

            const chunks: Buffer[] = [];
            let total = 0;

            for await (const chunk of body) {
                const buffer = toBuffer(chunk);
                total += buffer.length;
                if (this.maxBytes !== undefined && total > this.maxBytes) {
                    throw this.tooLarge(sourceProviderId, `Download exceeded the ${this.maxBytes} byte limit`);
                }
                chunks.push(buffer);
            }

            const bytes = Buffer.concat(chunks, total);
            return { filename, mimeType, bytes, sizeBytes: bytes.length };
        } catch (error) {
            body.destroy();
            throw toMediaRouteError(error, sourceProviderId);
        }
    }

    /**
     * Streaming form: normalized name and MIME, body handed through untouched
     */
    toStream(payload: RetrievedPayload): MediaStream {
        const { filename, mimeType } = this.describe(payload);

        try {
            this.checkDeclaredSize(payload);
        } catch (error) {
            payload.body.destroy();
            throw error;
        }

        return { filename, mimeType, sizeBytes: payload.sizeBytes, body: payload.body };
    }

    toErrorReport(error: unknown, providerId?: ProviderId): ErrorReport {
        return toMediaRouteError(error, providerId).report;
    }

    private checkDeclaredSize(payload: RetrievedPayload): void {
        if (this.maxBytes !== undefined && payload.sizeBytes !== undefined && payload.sizeBytes > this.maxBytes) {
            throw this.tooLarge(
                payload.sourceProviderId,
                `File is ${payload.sizeBytes} bytes, which exceeds the ${this.maxBytes} byte limit`,
            );
        }
    }

    private tooLarge(providerId: ProviderId, message: string): MediaRouteError {
        return new MediaRouteError(ErrorKind.PayloadTooLarge, message, { providerId });
    }
}

function toBuffer(chunk: unknown): Buffer {
    if (Buffer.isBuffer(chunk)) return chunk;
    if (chunk instanceof Uint8Array) return Buffer.from(chunk);
    return Buffer.from(String(chunk));
}
