import fs from 'fs';
import os from 'os';
import path from 'path';
import { MAX_FILESIZE_SKIPPED, YtDlpExtractor } from '../src/download/extractors/YtDlpExtractor';

const VIDEO_URL = 'https://www.youtube.com/watch?v=abc';

describe('yt-dlp Extractor', () => {
    let binDir: string;

    beforeEach(() => {
        binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-router-ytdlp-'));
    });

    afterEach(() => {
        fs.rmSync(binDir, { recursive: true, force: true });
    });

    // Stand-in executable: records its arguments, then runs the given shell body
    function extractorRunning(body: string): YtDlpExtractor {
        const binaryPath = path.join(binDir, 'yt-dlp');
        const script = `#!/bin/sh\nprintf '%s\\n' "$@" > "${argsFile()}"\n${body}\n`;
        fs.writeFileSync(binaryPath, script, { mode: 0o755 });
        return new YtDlpExtractor({ binaryPath });
    }

    function argsFile(): string {
        return path.join(binDir, 'args.txt');
    }

    function recordedArgs(): string[] {
        return fs.readFileSync(argsFile(), 'utf-8').trimEnd().split('\n');
    }

    describe('probe', () => {
        it('should read metadata from --dump-json output', async () => {
            const extractor = extractorRunning(`echo '{"title":"Clip","ext":"webm","filesize":42}'`);

            const info = await extractor.probe(VIDEO_URL, { timeoutMs: 5000, cookiesPath: '/tmp/test-cookies.txt' });

            expect(info).toEqual({ title: 'Clip', extension: 'webm', sizeBytes: 42 });
            expect(recordedArgs()).toEqual([
                '--dump-json',
                '--no-playlist',
                '--no-warnings',
                '--skip-download',
                '-f', 'bv*+ba/b',
                '--socket-timeout', '15',
                '--cookies', '/tmp/test-cookies.txt',
                '--', VIDEO_URL,
            ]);
        });

        it('should reject unreadable metadata', async () => {
            const extractor = extractorRunning(`echo 'not json'`);

            await expect(extractor.probe(VIDEO_URL, { timeoutMs: 5000 })).rejects.toMatchObject({
                name: 'ExtractorError',
                message: 'yt-dlp returned unreadable metadata',
            });
        });

        it('should refuse non-http URLs without running the binary', async () => {
            const extractor = extractorRunning('exit 0');

            await expect(extractor.probe('ftp://example.com/a.mp4', { timeoutMs: 5000 })).rejects.toThrow();
            expect(fs.existsSync(argsFile())).toBe(false);
        });
    });

    describe('download', () => {
        it('should pass the size limit and return the log output', async () => {
            const extractor = extractorRunning(
                `echo '[download] File is larger than max-filesize (5000 bytes > 100 bytes). Aborting.'`,
            );
            const template = path.join(binDir, 'clip.%(ext)s');

            const output = await extractor.download(VIDEO_URL, template, { timeoutMs: 5000, maxBytes: 100 });

            expect(output).toMatch(MAX_FILESIZE_SKIPPED);
            expect(recordedArgs()).toEqual([
                '-f', 'bv*+ba/b',
                '--merge-output-format', 'mp4',
                '-o', template,
                '--no-playlist',
                '--no-mtime',
                '--no-warnings',
                '--no-progress',
                '--socket-timeout', '15',
                '--max-filesize', '100',
                '--', VIDEO_URL,
            ]);
        });
    });

    describe('process failures', () => {
        it('should turn stderr and the exit code into an ExtractorError', async () => {
            const extractor = extractorRunning(`echo 'ERROR: Unsupported URL: https://example.com' >&2\nexit 1`);

            await expect(extractor.probe(VIDEO_URL, { timeoutMs: 5000 })).rejects.toMatchObject({
                name: 'ExtractorError',
                message: 'ERROR: Unsupported URL: https://example.com',
                exitCode: 1,
                killed: false,
                timedOut: false,
            });
        });

        it('should kill the process when the timeout passes', async () => {
            const extractor = extractorRunning('exec sleep 5');

            await expect(extractor.probe(VIDEO_URL, { timeoutMs: 200 })).rejects.toMatchObject({
                message: 'yt-dlp timed out after 200ms',
                killed: true,
                timedOut: true,
            });
        });

        it('should kill the process when the caller aborts', async () => {
            const extractor = extractorRunning('exec sleep 5');
            const controller = new AbortController();
            setTimeout(() => controller.abort(), 100);

            await expect(
                extractor.download(VIDEO_URL, path.join(binDir, 'x.%(ext)s'), {
                    timeoutMs: 5000,
                    signal: controller.signal,
                }),
            ).rejects.toMatchObject({
                message: 'Process cancelled',
                killed: true,
                timedOut: false,
            });
        });

        it('should report a missing binary', async () => {
            const extractor = new YtDlpExtractor({ binaryPath: path.join(binDir, 'missing-yt-dlp') });

            await expect(extractor.probe(VIDEO_URL, { timeoutMs: 5000 })).rejects.toThrow(
                /^Failed to start yt-dlp: spawn .*missing-yt-dlp ENOENT$/,
            );
        });
    });
});
