/**
 * GenericHttpProvider - Direct GET of the URL, redirects followed
 * Universal fallback: every classification ends with this provider unless it is already primary
 */

import { BaseProvider, BaseProviderOptions, parseContentLength } from './BaseProvider';
import { logger } from '../../utils/logger';
import { ErrorKind } from '../core/errors';
import { FALLBACK_FILENAME, sanitize } from '../security/FileSanitizer';
import { normalizeMime } from '../security/mimeTypes';
import {
    FetchContext,
    ProbeResult,
    ProviderCapabilities,
    RetrievedPayload,
} from '../core/types';
import { ScopedSignal } from '../../utils/abort';

export class GenericHttpProvider extends BaseProvider {
    readonly id = 'generic-http' as const;

    readonly capabilities: ProviderCapabilities = {
        handlesDomain: () => true,
        requiresCredential: false,
        supportsStreamingProbe: true,
    };

    constructor(options: BaseProviderOptions = {}) {
        super(options);
    }

    /**
     * Fetch the URL directly
     */
    async fetch(url: string, context: FetchContext): Promise<RetrievedPayload> {
        logger.info(`[${this.id}] Direct download`, { url });
        const { response, scope } = await this.openResponse(url, { method: 'GET' }, context, this.downloadTimeout);
        return this.payloadFromResponse(response, scope, url, context);
    }

    /**
     * Turn an already-open response into a payload (used by providers that pre-check first)
     */
    payloadFromResponse(
        response: Response,
        scope: ScopedSignal,
        url: string,
        context: FetchContext,
    ): RetrievedPayload {
        if (!response.ok) {
            scope.clear();
            this.discard(response);
            throw this.fail(
                ErrorKind.NetworkError,
                `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''} from ${response.url || url}`,
            );
        }

        const body = this.toBoundedBody(response, scope, context, url);
        const contentType = response.headers.get('content-type');

        return {
            sourceProviderId: this.id,
            suggestedName: resolveFilename(response.headers.get('content-disposition'), response.url || url),
            declaredMime: contentType ? normalizeMime(contentType) || undefined : undefined,
            sizeBytes: parseContentLength(response.headers.get('content-length')),
            body,
        };
    }

    /**
     * HEAD request for size and filename
     */
    async probe(url: string, context: FetchContext): Promise<ProbeResult> {
        const { response, scope } = await this.openResponse(url, { method: 'HEAD' }, context, this.requestTimeout);
        scope.clear();
        return this.probeFromResponse(response, url);
    }

    /**
     * Size and filename from the headers of a HEAD response
     */
    probeFromResponse(response: Response, url: string): ProbeResult {
        if (!response.ok) {
            throw this.fail(ErrorKind.NetworkError, `HTTP ${response.status} from ${url}`);
        }

        return {
            sizeBytes: parseContentLength(response.headers.get('content-length')),
            suggestedName: sanitize(resolveFilename(response.headers.get('content-disposition'), response.url || url)),
        };
    }
}

/**
 * Filename from Content-Disposition, then the URL path, then the fallback constant
 */
export function resolveFilename(contentDisposition: string | null, url: string): string {
    return filenameFromContentDisposition(contentDisposition)
        ?? filenameFromUrl(url)
        ?? FALLBACK_FILENAME;
}

export function filenameFromContentDisposition(header: string | null): string | undefined {
    if (!header) return undefined;

    // RFC 5987 extended value takes precedence: filename*=UTF-8''name.ext
    const extended = header.match(/filename\*\s*=\s*[^']*'[^']*'([^;]+)/i);
    const plain = header.match(/filename\s*=\s*(?:"([^"]*)"|([^;]+))/i);

    const raw = extended?.[1] ?? plain?.[1] ?? plain?.[2];
    if (!raw) return undefined;

    const candidate = safeDecode(raw.trim().replace(/^"|"$/g, '')).trim();
    return isUsableName(candidate) ? candidate : undefined;
}

export function filenameFromUrl(url: string): string | undefined {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        return undefined;
    }

    const lastSegment = pathname.replace(/\/+$/, '').split('/').pop();
    if (!lastSegment) return undefined;

    const candidate = safeDecode(lastSegment);
    return candidate.includes('.') ? candidate : undefined;
}

function isUsableName(name: string): boolean {
    return name.includes('.') && !name.endsWith('.');
}

function safeDecode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}
