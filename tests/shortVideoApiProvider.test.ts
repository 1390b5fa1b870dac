import { ShortVideoApiProvider } from '../src/download/providers/ShortVideoApiProvider';
import { ErrorKind } from '../src/download/core/errors';
import { fakeFetch, headerOf, readAll } from './helpers/fakes';

const API_URL = 'https://api.example.test/';
const VIDEO_PAGE = 'https://www.tiktok.com/@tester/video/1';
const MEDIA_URL = 'https://cdn.example.test/v.mp4';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function mp4Response(): Response {
    return new Response('mp4-bytes', { headers: { 'content-type': 'video/mp4' } });
}

function providerWith(api: () => Response, media: () => Response = mp4Response) {
    const fetchImpl = fakeFetch((url) => (url.startsWith(API_URL) ? api() : media()));
    return { fetchImpl, provider: new ShortVideoApiProvider({ fetchImpl, apiUrl: API_URL }) };
}

describe('Short-Video API Provider', () => {
    it('should resolve the play URL and fetch the video', async () => {
        const { fetchImpl, provider } = providerWith(
            () => jsonResponse({
                code: 0,
                msg: 'success',
                data: { play: MEDIA_URL, title: 'dance', size: 9, author: { unique_id: 'tester' } },
            }),
            () => new Response('mp4-bytes', { headers: { 'content-type': 'video/mp4' } }),
        );

        const payload = await provider.fetch(VIDEO_PAGE, {});

        expect(fetchImpl.mock.calls[0]?.[0]).toBe(`${API_URL}?url=${encodeURIComponent(VIDEO_PAGE)}`);
        expect(fetchImpl.mock.calls[1]?.[0]).toBe(MEDIA_URL);
        expect(headerOf(fetchImpl.mock.calls[1]?.[1], 'referer')).toBe('https://www.tiktok.com/');
        expect(payload).toMatchObject({
            sourceProviderId: 'short-video-api',
            suggestedName: 'tester_dance.mp4',
            declaredMime: 'video/mp4',
            sizeBytes: 9,
        });
        expect((await readAll(payload.body)).toString()).toBe('mp4-bytes');
    });

    it('should default the name parts and MIME type', async () => {
        const { provider } = providerWith(
            () => jsonResponse({ code: 0, data: { play: MEDIA_URL } }),
            () => new Response('x', { headers: { 'content-type': 'application/octet-stream' } }),
        );

        const payload = await provider.fetch(VIDEO_PAGE, {});

        expect(payload.suggestedName).toBe('user_tiktok_video.mp4');
        expect(payload.declaredMime).toBe('video/mp4');
    });

    it('should map an API rejection to a recoverable ProviderRejected', async () => {
        const { fetchImpl, provider } = providerWith(() => jsonResponse({ code: -1, msg: 'Url parsing is failed!' }));

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.ProviderRejected,
            recoverable: true,
            message: 'TikTok download failed (API: api.example.test): Url parsing is failed!',
        });
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('should treat a success code without a play URL as rejected', async () => {
        const { provider } = providerWith(() => jsonResponse({ code: 0, data: { title: 'no video' } }));

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.ProviderRejected,
            message: 'TikTok download failed (API: api.example.test): Unknown API error',
        });
    });

    it('should map unreadable JSON to a recoverable ParsingError', async () => {
        const { provider } = providerWith(() => new Response('<html>busy</html>'));

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.ParsingError,
            recoverable: true,
            message: 'Error reading response from TikTok service',
        });
    });

    it('should map an unexpected envelope to a recoverable ParsingError', async () => {
        const { provider } = providerWith(() => jsonResponse({ status: 'ok' }));

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.ParsingError,
            recoverable: true,
        });
    });

    it('should map an API HTTP error to NetworkError', async () => {
        const { provider } = providerWith(() => jsonResponse({}, 500));

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.NetworkError,
            message: 'TikTok API returned HTTP 500',
        });
    });

    it('should map a failed media transfer to NetworkError', async () => {
        const { provider } = providerWith(
            () => jsonResponse({ code: 0, data: { play: MEDIA_URL } }),
            () => new Response('', { status: 403 }),
        );

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.NetworkError,
            message: 'HTTP 403 fetching resolved TikTok video',
        });
    });

    it('should reject a document served in place of the video', async () => {
        const { provider } = providerWith(
            () => jsonResponse({ code: 0, data: { play: MEDIA_URL, title: 'dance', author: { unique_id: 'tester' } } }),
            () => new Response('<html>blocked</html>', { headers: { 'content-type': 'text/html; charset=utf-8' } }),
        );

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.ProviderRejected,
            recoverable: true,
            message: 'TikTok video URL returned text/html instead of a video',
        });
    });

    it('should reject a JSON error body from the video URL', async () => {
        const { provider } = providerWith(
            () => jsonResponse({ code: 0, data: { play: MEDIA_URL } }),
            () => jsonResponse({ error: 'expired' }),
        );

        await expect(provider.fetch(VIDEO_PAGE, {})).rejects.toMatchObject({
            kind: ErrorKind.ProviderRejected,
            message: 'TikTok video URL returned application/json instead of a video',
        });
    });

    it('should always declare the video as mp4', async () => {
        const { provider } = providerWith(
            () => jsonResponse({ code: 0, data: { play: MEDIA_URL } }),
            () => new Response('webm-bytes', { headers: { 'content-type': 'video/webm' } }),
        );

        const payload = await provider.fetch(VIDEO_PAGE, {});

        expect(payload.suggestedName).toBe('user_tiktok_video.mp4');
        expect(payload.declaredMime).toBe('video/mp4');
    });

    it('should refuse a reported size over the limit before opening the video', async () => {
        const { fetchImpl, provider } = providerWith(
            () => jsonResponse({ code: 0, data: { play: MEDIA_URL, size: 5000 } }),
        );

        await expect(provider.fetch(VIDEO_PAGE, { maxBytes: 100 })).rejects.toMatchObject({
            kind: ErrorKind.PayloadTooLarge,
            recoverable: false,
            message: 'File is 5000 bytes, which exceeds the 100 byte limit',
        });
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
});
