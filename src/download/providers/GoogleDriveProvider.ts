/**
 * GoogleDriveProvider - Resolves Drive share links to the direct export endpoint
 * Drive answers with an HTML interstitial when a file needs confirmation, login or
 * is not shared publicly; no other provider can get past that, so it is terminal.
 */

import { BaseProvider, BaseProviderOptions } from './BaseProvider';
import { GenericHttpProvider } from './GenericHttpProvider';
import { logger } from '../../utils/logger';
import { ErrorKind } from '../core/errors';
import {
    FetchContext,
    ProbeResult,
    ProviderCapabilities,
    RetrievedPayload,
} from '../core/types';

const EXPORT_BASE = 'https://drive.google.com/uc';

export class GoogleDriveProvider extends BaseProvider {
    readonly id = 'google-drive' as const;

    readonly capabilities: ProviderCapabilities = {
        handlesDomain: (host) => host.includes('drive.google.com'),
        requiresCredential: false,
        supportsStreamingProbe: true,
    };

    private readonly generic: GenericHttpProvider;

    constructor(generic: GenericHttpProvider, options: BaseProviderOptions = {}) {
        super(options);
        this.generic = generic;
    }

    async fetch(url: string, context: FetchContext): Promise<RetrievedPayload> {
        const exportUrl = this.toExportUrl(url);
        logger.info(`[${this.id}] Checking export link`, { exportUrl });

        const { response, scope } = await this.openResponse(exportUrl, { method: 'GET' }, context, this.downloadTimeout);

        if (isHtml(response)) {
            scope.clear();
            this.discard(response);
            throw this.fail(
                ErrorKind.AccessDenied,
                "Google Drive link requires confirmation/login or isn't shared publicly",
            );
        }

        // Hand the open response to the generic transfer instead of requesting again
        const payload = this.generic.payloadFromResponse(response, scope, exportUrl, context);
        return { ...payload, sourceProviderId: this.id };
    }

    async probe(url: string, context: FetchContext): Promise<ProbeResult> {
        const exportUrl = this.toExportUrl(url);
        const { response, scope } = await this.openResponse(exportUrl, { method: 'HEAD' }, context, this.requestTimeout);
        scope.clear();

        if (isHtml(response)) {
            return {};
        }
        return this.generic.probeFromResponse(response, exportUrl);
    }

    /**
     * /file/d/<id>/view or ?id=<id>  ->  uc?export=download&id=<id>&confirm=t
     */
    toExportUrl(url: string): string {
        const fileId = extractDriveFileId(url);
        if (!fileId) {
            throw this.fail(ErrorKind.ParsingError, 'Could not parse Google Drive link format');
        }
        return `${EXPORT_BASE}?export=download&id=${encodeURIComponent(fileId)}&confirm=t`;
    }
}

export function extractDriveFileId(url: string): string | undefined {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return undefined;
    }

    const pathMatch = parsed.pathname.match(/\/d\/([^/]+)/);
    if (pathMatch?.[1]) return pathMatch[1];

    return parsed.searchParams.get('id') || undefined;
}

function isHtml(response: Response): boolean {
    return (response.headers.get('content-type') || '').toLowerCase().includes('text/html');
}
