/**
 * BaseProvider - Abstract base class for all retrieval providers
 * Implements the shared plumbing: classified failures, bounded timeouts,
 * cancellation and size-limited response bodies.
 *
 * Providers keep no state between calls; everything request-scoped lives in the FetchContext.
 */

import { Readable } from 'stream';
import { logger } from '../../utils/logger';
import { createScopedSignal, ScopedSignal } from '../../utils/abort';
import { DEFAULT_USER_AGENT } from '../../utils/config';
import { ErrorKind, MediaRouteError } from '../core/errors';
import {
    FetchContext,
    FetchImpl,
    IMediaProvider,
    ProviderCapabilities,
    ProviderId,
    RetrievedPayload,
} from '../core/types';

export interface BaseProviderOptions {
    fetchImpl?: FetchImpl;
    requestTimeout?: number;  // API calls, pre-checks, probes
    downloadTimeout?: number; // byte transfers
    userAgent?: string;
}

export interface OpenResponse {
    response: Response;
    scope: ScopedSignal;
}

const DEFAULT_REQUEST_TIMEOUT = 15000;
const DEFAULT_DOWNLOAD_TIMEOUT = 180000;

export abstract class BaseProvider implements IMediaProvider {
    abstract readonly id: ProviderId;
    abstract readonly capabilities: ProviderCapabilities;

    protected readonly fetchImpl: FetchImpl;
    protected readonly requestTimeout: number;
    protected readonly downloadTimeout: number;
    protected readonly userAgent: string;

    constructor(options: BaseProviderOptions = {}) {
        this.fetchImpl = options.fetchImpl || fetch;
        this.requestTimeout = options.requestTimeout || DEFAULT_REQUEST_TIMEOUT;
        this.downloadTimeout = options.downloadTimeout || DEFAULT_DOWNLOAD_TIMEOUT;
        this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    }

    /**
     * Retrieve the artifact - must be implemented by subclass
     */
    abstract fetch(url: string, context: FetchContext): Promise<RetrievedPayload>;

    /**
     * Build a classified failure tagged with this provider
     */
    protected fail(
        kind: ErrorKind,
        message: string,
        options: { recoverable?: boolean; cause?: unknown } = {},
    ): MediaRouteError {
        return new MediaRouteError(kind, message, {
            providerId: this.id,
            recoverable: options.recoverable,
            cause: options.cause,
        });
    }

    protected ensureNotAborted(context: FetchContext): void {
        if (context.signal?.aborted) {
            throw this.fail(ErrorKind.Cancelled, 'Download cancelled');
        }
    }

    /**
     * Issue a request under a timeout linked to the caller's signal.
     * The returned scope stays armed until the caller clears it (after the body is consumed).
     */
    protected async openResponse(
        url: string,
        init: RequestInit,
        context: FetchContext,
        timeoutMs: number,
    ): Promise<OpenResponse> {
        this.ensureNotAborted(context);
        const scope = createScopedSignal(timeoutMs, context.signal);

        const headers = new Headers(init.headers);
        if (!headers.has('user-agent')) {
            headers.set('User-Agent', this.userAgent);
        }

        try {
            const response = await this.fetchImpl(url, {
                redirect: 'follow',
                ...init,
                headers,
                signal: scope.signal,
            });
            return { response, scope };
        } catch (error) {
            scope.clear();
            throw this.transportFailure(error, url, scope, context, timeoutMs);
        }
    }

    /**
     * Request and read a small text body (API envelopes, pre-checks) within the request timeout
     */
    protected async requestText(
        url: string,
        init: RequestInit,
        context: FetchContext,
    ): Promise<{ response: Response; text: string }> {
        const { response, scope } = await this.openResponse(url, init, context, this.requestTimeout);
        try {
            const text = await response.text();
            return { response, text };
        } catch (error) {
            throw this.transportFailure(error, url, scope, context, this.requestTimeout);
        } finally {
            scope.clear();
        }
    }

    /**
     * Wrap a response body in a Readable that enforces maxBytes and releases the scope when done
     */
    protected toBoundedBody(
        response: Response,
        scope: ScopedSignal,
        context: FetchContext,
        url: string,
    ): Readable {
        const maxBytes = context.maxBytes;
        const declared = parseContentLength(response.headers.get('content-length'));

        if (maxBytes !== undefined && declared !== undefined && declared > maxBytes) {
            scope.clear();
            this.discard(response);
            throw this.fail(
                ErrorKind.PayloadTooLarge,
                `File is ${declared} bytes, which exceeds the ${maxBytes} byte limit`,
            );
        }

        const reader = response.body?.getReader();
        if (!reader) {
            scope.clear();
            return Readable.from([]);
        }

        const tooLarge = (): MediaRouteError =>
            this.fail(ErrorKind.PayloadTooLarge, `Transfer exceeded the ${maxBytes} byte limit`);
        const interrupted = (error: unknown): MediaRouteError =>
            error instanceof MediaRouteError
                ? error
                : this.transportFailure(error, url, scope, context, this.downloadTimeout);
        const providerId = this.id;

        let received = 0;
        let finished = false;

        // Scope and upstream reader are released from destroy, which also runs when
        // the stream is torn down before its first read
        return new Readable({
            read() {
                void reader.read().then(
                    ({ done, value }) => {
                        if (this.destroyed) return;
                        if (done) {
                            finished = true;
                            scope.clear();
                            this.push(null);
                            return;
                        }
                        const chunk = Buffer.from(value);
                        received += chunk.length;
                        if (maxBytes !== undefined && received > maxBytes) {
                            this.destroy(tooLarge());
                            return;
                        }
                        this.push(chunk);
                    },
                    (error: unknown) => {
                        if (this.destroyed) return;
                        this.destroy(interrupted(error));
                    },
                );
            },
            destroy(error, callback) {
                scope.clear();
                if (finished) {
                    callback(error);
                    return;
                }
                reader.cancel().then(
                    () => callback(error),
                    (cancelError: unknown) => {
                        logger.debug(`[${providerId}] Failed to release response body`, {
                            error: String(cancelError),
                        });
                        callback(error);
                    },
                );
            },
        });
    }

    /**
     * Cancel a body that will not be read
     */
    protected discard(response: Response): void {
        void response.body?.cancel().catch((error: unknown) => {
            logger.debug(`[${this.id}] Failed to release response body`, { error: String(error) });
        });
    }

    /**
     * Map a fetch/transfer failure: caller abort -> Cancelled, everything else -> NetworkError
     */
    protected transportFailure(
        error: unknown,
        url: string,
        scope: ScopedSignal,
        context: FetchContext,
        timeoutMs: number,
    ): MediaRouteError {
        if (error instanceof MediaRouteError) return error;

        if (context.signal?.aborted) {
            return this.fail(ErrorKind.Cancelled, 'Download cancelled', { cause: error });
        }

        const host = safeHost(url);
        if (scope.timedOut()) {
            return this.fail(
                ErrorKind.NetworkError,
                `Request to ${host} timed out after ${timeoutMs}ms`,
                { cause: error },
            );
        }

        const detail = describeTransportError(error);
        logger.debug(`[${this.id}] Transport failure`, { host, detail });
        return this.fail(ErrorKind.NetworkError, `Network error contacting ${host}: ${detail}`, {
            cause: error,
        });
    }
}

export function parseContentLength(header: string | null): number | undefined {
    if (!header || !/^\d+$/.test(header.trim())) return undefined;
    const value = Number(header.trim());
    return Number.isSafeInteger(value) ? value : undefined;
}

export function safeHost(url: string): string {
    try {
        return new URL(url).host;
    } catch {
        return url;
    }
}

function describeTransportError(error: unknown): string {
    if (!(error instanceof Error)) return String(error);

    // undici reports DNS/TLS/socket problems on error.cause
    const cause = error.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause) {
        return `${error.message} (${String(cause.code)})`;
    }
    return error.message;
}
