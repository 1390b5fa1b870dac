/**
 * Error model for the media router.
 * Every failure a provider can raise is a MediaRouteError tagged with an ErrorKind;
 * recoverability decides whether the orchestrator moves on to the next candidate.
 */

import type { ProviderId } from './types';

export enum ErrorKind {
    InvalidURL = 'InvalidURL',
    ParsingError = 'ParsingError',
    UnsupportedURL = 'UnsupportedURL',
    AccessDenied = 'AccessDenied',
    LoginRequired = 'LoginRequired',
    NotFound = 'NotFound',
    ProviderRejected = 'ProviderRejected',
    ProviderUnavailable = 'ProviderUnavailable',
    NetworkError = 'NetworkError',
    NoArtifactProduced = 'NoArtifactProduced',
    PayloadTooLarge = 'PayloadTooLarge',
    Cancelled = 'Cancelled',
    Unknown = 'Unknown',
}

export interface ErrorReport {
    kind: ErrorKind;
    providerId?: ProviderId;
    humanMessage: string;
    recoverable: boolean;
}

// Default recoverability per kind. Providers override only where noted in their mapping.
export const RECOVERABLE_BY_KIND: Readonly<Record<ErrorKind, boolean>> = {
    [ErrorKind.InvalidURL]: false,
    [ErrorKind.ParsingError]: false,
    [ErrorKind.UnsupportedURL]: true,
    [ErrorKind.AccessDenied]: false,
    [ErrorKind.LoginRequired]: false,
    [ErrorKind.NotFound]: false,
    [ErrorKind.ProviderRejected]: true,
    [ErrorKind.ProviderUnavailable]: true,
    [ErrorKind.NetworkError]: true,
    [ErrorKind.NoArtifactProduced]: false,
    [ErrorKind.PayloadTooLarge]: false,
    [ErrorKind.Cancelled]: false,
    [ErrorKind.Unknown]: false,
};

export const MAX_CAUSE_LENGTH = 300;

export function truncateCause(text: string, max: number = MAX_CAUSE_LENGTH): string {
    const trimmed = text.trim();
    if (trimmed.length <= max) return trimmed;
    return `${trimmed.substring(0, max - 3)}...`;
}

export interface MediaRouteErrorOptions {
    providerId?: ProviderId;
    recoverable?: boolean;
    cause?: unknown;
}

export class MediaRouteError extends Error {
    readonly kind: ErrorKind;
    readonly providerId?: ProviderId;
    readonly recoverable: boolean;

    constructor(kind: ErrorKind, message: string, options: MediaRouteErrorOptions = {}) {
        super(truncateCause(message), { cause: options.cause });
        this.name = 'MediaRouteError';
        this.kind = kind;
        this.providerId = options.providerId;
        this.recoverable = options.recoverable ?? RECOVERABLE_BY_KIND[kind];
    }

    get report(): ErrorReport {
        return {
            kind: this.kind,
            providerId: this.providerId,
            humanMessage: this.message,
            recoverable: this.recoverable,
        };
    }
}

export function isMediaRouteError(error: unknown): error is MediaRouteError {
    return error instanceof MediaRouteError;
}

/**
 * Normalize anything thrown into a MediaRouteError attributed to providerId.
 * Unclassified failures become Unknown.
 */
export function toMediaRouteError(error: unknown, providerId?: ProviderId): MediaRouteError {
    if (isMediaRouteError(error)) {
        if (!providerId || error.providerId === providerId) return error;
        return new MediaRouteError(error.kind, error.message, {
            providerId,
            recoverable: error.recoverable,
            cause: error.cause,
        });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new MediaRouteError(ErrorKind.Unknown, message || 'Unknown error', {
        providerId,
        cause: error,
    });
}
