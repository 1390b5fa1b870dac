/**
 * ProviderManager - Registry of retrieval providers keyed by id
 * Turns classifier candidates into the ordered providers the orchestrator will try.
 */

import { logger } from '../../utils/logger';
import { IMediaProvider, ProviderCandidate, ProviderId } from './types';

export class ProviderManager {
    private readonly providers = new Map<ProviderId, IMediaProvider>();

    /**
     * Register a provider; a later registration under the same id replaces the earlier one
     */
    register(provider: IMediaProvider): this {
        if (this.providers.has(provider.id)) {
            logger.warn('Provider replaced', { providerId: provider.id });
        }
        this.providers.set(provider.id, provider);
        logger.debug('Provider registered', {
            providerId: provider.id,
            requiresCredential: provider.capabilities.requiresCredential,
        });
        return this;
    }

    get(id: ProviderId): IMediaProvider | undefined {
        return this.providers.get(id);
    }

    has(id: ProviderId): boolean {
        return this.providers.has(id);
    }

    getProviders(): IMediaProvider[] {
        return Array.from(this.providers.values());
    }

    /**
     * Providers for the candidates, highest priority first.
     * Candidates without a registered provider are skipped.
     */
    resolve(candidates: readonly ProviderCandidate[]): IMediaProvider[] {
        const ordered = [...candidates].sort((a, b) => b.priority - a.priority);
        const resolved: IMediaProvider[] = [];

        for (const candidate of ordered) {
            const provider = this.providers.get(candidate.providerId);
            if (!provider) {
                logger.warn('No provider registered for candidate', { providerId: candidate.providerId });
                continue;
            }
            resolved.push(provider);
        }

        return resolved;
    }
}
