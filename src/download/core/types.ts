/**
 * Core Types for the Media Router
 * Defines the data model shared by the classifier, providers, orchestrator and assembler
 */

import type { Readable } from 'stream';
import type { ErrorReport } from './errors';

// ============================================================================
// Identifiers
// ============================================================================

export type ProviderId =
    | 'generic-http'
    | 'google-drive'
    | 'short-video-api'
    | 'social-post'
    | 'video-extractor';

export const GENERIC_HTTP: ProviderId = 'generic-http';

// ============================================================================
// Request & Routing Types
// ============================================================================

export interface MediaRequest {
    readonly rawUrl: string;
}

export function createMediaRequest(rawUrl: string): MediaRequest {
    return Object.freeze({ rawUrl: rawUrl.trim() });
}

export interface ProviderCandidate {
    readonly providerId: ProviderId;
    readonly priority: number; // higher is tried first
}

// ============================================================================
// Credential Types
// ============================================================================

export interface Cookie {
    readonly domain: string;
    readonly includeSubdomains: boolean;
    readonly path: string;
    readonly secure: boolean;
    readonly expires: number; // unix seconds, 0 for session cookies
    readonly name: string;
    readonly value: string;
}

/**
 * Cookie jar loaded once at startup. Frozen; providers only read it.
 */
export interface CredentialBlob {
    readonly path: string;
    readonly cookies: ReadonlyArray<Cookie>;
}

// ============================================================================
// Payload & Result Types
// ============================================================================

export interface RetrievedPayload {
    sourceProviderId: ProviderId;
    suggestedName: string;
    declaredMime?: string;
    sizeBytes?: number;
    body: Readable;
}

export interface MediaArtifact {
    filename: string;
    mimeType: string;
    bytes: Buffer;
    sizeBytes: number;
}

export interface MediaStream {
    filename: string;
    mimeType: string;
    sizeBytes?: number;
    body: Readable;
}

export interface ProbeResult {
    sizeBytes?: number;
    suggestedName?: string;
}

// ============================================================================
// Provider Types
// ============================================================================

export interface ProviderCapabilities {
    handlesDomain(host: string): boolean;
    requiresCredential: boolean;
    supportsStreamingProbe: boolean;
}

export interface FetchContext {
    credential?: CredentialBlob;
    signal?: AbortSignal;
    maxBytes?: number;
}

export type FetchImpl = typeof fetch;

export interface IMediaProvider {
    readonly id: ProviderId;
    readonly capabilities: ProviderCapabilities;

    /**
     * Retrieve the artifact behind the URL. Rejects with a MediaRouteError.
     */
    fetch(url: string, context: FetchContext): Promise<RetrievedPayload>;

    /**
     * Optional pre-flight size/name estimate. Never required for a fetch.
     */
    probe?(url: string, context: FetchContext): Promise<ProbeResult>;
}

// ============================================================================
// Event Types
// ============================================================================

export type RouteEventType =
    | 'attempt:started'
    | 'attempt:failed'
    | 'provider:switched'
    | 'route:completed';

export interface RouteEvent {
    type: RouteEventType;
    providerId: ProviderId;
    attempt: number;
    timestamp: Date;
    report?: ErrorReport;
}

export interface RouteOptions {
    signal?: AbortSignal;
}
