/**
 * DownloadOrchestrator - Drives one routing pass per request
 *
 * Start -> Classifying -> Attempting(i) -> Success | Attempting(i+1) | Terminal
 *
 * Candidates are tried one at a time in classifier order. A recoverable failure moves on to
 * the next candidate; a terminal one stops the pass. Progress is published as events.
 */

import { EventEmitter } from 'events';
import { logError, logger } from '../../utils/logger';
import { ProviderManager } from './ProviderManager';
import { ResultAssembler } from './ResultAssembler';
import { classify as defaultClassify } from './UrlClassifier';
import { ErrorKind, MediaRouteError, toMediaRouteError } from './errors';
import {
    CredentialBlob,
    FetchContext,
    IMediaProvider,
    MediaArtifact,
    MediaRequest,
    MediaStream,
    ProbeResult,
    ProviderCandidate,
    ProviderId,
    RetrievedPayload,
    RouteEvent,
    RouteEventType,
    RouteOptions,
} from './types';

export type Classifier = (url: string) => readonly ProviderCandidate[];

export interface DownloadOrchestratorOptions {
    providers: ProviderManager;
    classifier?: Classifier;
    credential?: CredentialBlob;
    maxBytes?: number;
    assembler?: ResultAssembler;
}

export class DownloadOrchestrator extends EventEmitter {
    private readonly providers: ProviderManager;
    private readonly classifier: Classifier;
    private readonly credential?: CredentialBlob;
    private readonly maxBytes?: number;
    private readonly assembler: ResultAssembler;

    constructor(options: DownloadOrchestratorOptions) {
        super();
        this.providers = options.providers;
        this.classifier = options.classifier || defaultClassify;
        this.credential = options.credential;
        this.maxBytes = options.maxBytes;
        this.assembler = options.assembler || new ResultAssembler({ maxBytes: options.maxBytes });
    }

    /**
     * Candidates that a routing pass would attempt, in order
     */
    classify(request: MediaRequest): readonly ProviderCandidate[] {
        return this.classifier(request.rawUrl);
    }

    /**
     * Retrieve and fully buffer the artifact behind the request
     * @throws MediaRouteError carrying the final ErrorReport
     */
    async route(request: MediaRequest, options: RouteOptions = {}): Promise<MediaArtifact> {
        return this.run(request, options, (payload) => this.assembler.assemble(payload));
    }

    /**
     * Same routing pass, but hands back the body as it arrives
     */
    async open(request: MediaRequest, options: RouteOptions = {}): Promise<MediaStream> {
        return this.run(request, options, async (payload) => this.assembler.toStream(payload));
    }

    /**
     * Size/name estimate from the primary candidate. Never fails except for an invalid URL.
     */
    async probe(request: MediaRequest, options: RouteOptions = {}): Promise<ProbeResult> {
        const [primary] = this.providers.resolve(this.classify(request));
        if (!primary?.probe) return {};

        try {
            return await primary.probe(request.rawUrl, this.context(options));
        } catch (error) {
            const failure = toMediaRouteError(error, primary.id);
            logger.warn('Probe failed', {
                providerId: primary.id,
                kind: failure.kind,
                message: failure.message,
            });
            return {};
        }
    }

    private resolve(request: MediaRequest): IMediaProvider[] {
        const candidates = this.classify(request);
        const providers = this.providers.resolve(candidates);

        if (providers.length === 0) {
            throw new MediaRouteError(ErrorKind.UnsupportedURL, 'No provider is available for this URL', {
                recoverable: false,
            });
        }
        return providers;
    }

    private async run<T>(
        request: MediaRequest,
        options: RouteOptions,
        finish: (payload: RetrievedPayload) => Promise<T>,
    ): Promise<T> {
        let providers: IMediaProvider[];
        try {
            providers = this.resolve(request);
        } catch (error) {
            throw this.terminal(toMediaRouteError(error), request);
        }

        const context = this.context(options);
        let lastFailure: MediaRouteError | undefined;

        for (let i = 0; i < providers.length; i++) {
            const provider = providers[i];
            if (!provider) continue;
            const attempt = i + 1;

            if (options.signal?.aborted) {
                throw this.terminal(
                    new MediaRouteError(ErrorKind.Cancelled, 'Download cancelled', { providerId: lastFailure?.providerId }),
                    request,
                );
            }

            if (lastFailure) {
                logger.info('Switching provider', { from: lastFailure.providerId, to: provider.id });
                this.publish('provider:switched', provider.id, attempt);
            }

            this.publish('attempt:started', provider.id, attempt);
            logger.info('Attempting provider', { providerId: provider.id, attempt, url: request.rawUrl });

            try {
                const payload = await provider.fetch(request.rawUrl, context);
                const result = await finish(payload);
                this.publish('route:completed', provider.id, attempt);
                logger.info('Route completed', { providerId: provider.id, attempt });
                return result;
            } catch (error) {
                const failure = toMediaRouteError(error, provider.id);
                this.publish('attempt:failed', provider.id, attempt, failure);
                logger.warn('Provider attempt failed', {
                    providerId: provider.id,
                    kind: failure.kind,
                    recoverable: failure.recoverable,
                    message: failure.message,
                });

                if (!failure.recoverable) {
                    throw this.terminal(failure, request);
                }
                lastFailure = failure;
            }
        }

        // Every candidate failed recoverably; the last cause is the one reported
        const exhausted = lastFailure
            ?? new MediaRouteError(ErrorKind.Unknown, 'No provider produced a result');
        throw this.terminal(exhausted, request);
    }

    private context(options: RouteOptions): FetchContext {
        return {
            credential: this.credential,
            signal: options.signal,
            maxBytes: this.maxBytes,
        };
    }

    private publish(type: RouteEventType, providerId: ProviderId, attempt: number, failure?: MediaRouteError): void {
        const event: RouteEvent = {
            type,
            providerId,
            attempt,
            timestamp: new Date(),
            report: failure?.report,
        };
        this.emit(type, event);
    }

    private terminal(failure: MediaRouteError, request: MediaRequest): MediaRouteError {
        if (failure.kind === ErrorKind.InvalidURL || failure.kind === ErrorKind.Cancelled) {
            logger.info('Route stopped', { kind: failure.kind, message: failure.message });
        } else {
            logError(failure, { url: request.rawUrl, providerId: failure.providerId, kind: failure.kind });
        }
        return failure;
    }
}
