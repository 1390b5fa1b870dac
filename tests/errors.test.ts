import {
    ErrorKind,
    MediaRouteError,
    RECOVERABLE_BY_KIND,
    toMediaRouteError,
    truncateCause,
} from '../src/download/core/errors';
import { ProviderManager } from '../src/download/core/ProviderManager';
import { stubProvider, payloadOf } from './helpers/fakes';

describe('Error model', () => {
    it('should take recoverability from the kind table by default', () => {
        for (const kind of Object.values(ErrorKind)) {
            expect(new MediaRouteError(kind, 'x').recoverable).toBe(RECOVERABLE_BY_KIND[kind]);
        }
    });

    it('should only let routing-level failures fall through', () => {
        const recoverable = Object.values(ErrorKind).filter((kind) => RECOVERABLE_BY_KIND[kind]);
        expect(recoverable.sort()).toEqual([
            ErrorKind.NetworkError,
            ErrorKind.ProviderRejected,
            ErrorKind.ProviderUnavailable,
            ErrorKind.UnsupportedURL,
        ]);
    });

    it('should honour an explicit override', () => {
        expect(new MediaRouteError(ErrorKind.ParsingError, 'x', { recoverable: true }).recoverable).toBe(true);
    });

    it('should truncate long messages', () => {
        expect(truncateCause('  short  ')).toBe('short');
        expect(truncateCause('abcdefghij', 8)).toBe('abcde...');
        expect(new MediaRouteError(ErrorKind.Unknown, 'y'.repeat(400)).message).toHaveLength(300);
    });

    it('should keep the cause', () => {
        const cause = new Error('root');
        expect(new MediaRouteError(ErrorKind.Unknown, 'wrapped', { cause }).cause).toBe(cause);
    });

    it('should attribute a delegated failure to the calling provider', () => {
        const original = new MediaRouteError(ErrorKind.NetworkError, 'HTTP 500', { providerId: 'generic-http' });
        const retagged = toMediaRouteError(original, 'google-drive');

        expect(retagged.report).toEqual({
            kind: ErrorKind.NetworkError,
            providerId: 'google-drive',
            humanMessage: 'HTTP 500',
            recoverable: true,
        });
    });

    it('should wrap non-errors as Unknown', () => {
        expect(toMediaRouteError('plain string').report).toEqual({
            kind: ErrorKind.Unknown,
            providerId: undefined,
            humanMessage: 'plain string',
            recoverable: false,
        });
    });
});

describe('Provider Manager', () => {
    const generic = stubProvider('generic-http', async () => payloadOf('x'));
    const extractor = stubProvider('video-extractor', async () => payloadOf('x'));

    it('should resolve candidates by descending priority', () => {
        const manager = new ProviderManager().register(generic).register(extractor);

        expect(
            manager
                .resolve([
                    { providerId: 'generic-http', priority: 1 },
                    { providerId: 'video-extractor', priority: 2 },
                ])
                .map((provider) => provider.id),
        ).toEqual(['video-extractor', 'generic-http']);
    });

    it('should skip candidates without a registered provider', () => {
        const manager = new ProviderManager().register(generic);

        expect(
            manager.resolve([
                { providerId: 'social-post', priority: 2 },
                { providerId: 'generic-http', priority: 1 },
            ]),
        ).toEqual([generic]);
    });

    it('should replace a provider registered twice under one id', () => {
        const replacement = stubProvider('generic-http', async () => payloadOf('y'));
        const manager = new ProviderManager().register(generic).register(replacement);

        expect(manager.get('generic-http')).toBe(replacement);
        expect(manager.getProviders()).toHaveLength(1);
    });
});
