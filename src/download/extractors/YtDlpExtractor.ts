/**
 * YtDlpExtractor - Drives the yt-dlp binary as a subprocess
 * Covers YouTube, Facebook, Twitter/X, Vimeo, SoundCloud and the other sites yt-dlp supports.
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { ExtractorError, VideoExtractor, VideoExtractorOptions, VideoProbe } from './types';

// Best video + best audio, or the best single file when streams are not separate
const FORMAT_SELECTOR = 'bv*+ba/b';

// yt-dlp exits 0 without writing anything when --max-filesize trips
export const MAX_FILESIZE_SKIPPED = /larger than max-filesize/i;

// URL validation: nothing that could be read as an extra argument
const UrlSchema = z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), { message: 'Invalid URL format' });

const FormatSchema = z.object({
    filesize: z.number().nullish(),
    filesize_approx: z.number().nullish(),
});

const InfoSchema = z.object({
    title: z.string().nullish(),
    ext: z.string().nullish(),
    filesize: z.number().nullish(),
    filesize_approx: z.number().nullish(),
    requested_formats: z.array(FormatSchema.nullable()).nullish(),
});

export type YtDlpInfo = z.infer<typeof InfoSchema>;

export interface YtDlpExtractorOptions {
    binaryPath?: string;
    socketTimeoutSeconds?: number;
}

export class YtDlpExtractor implements VideoExtractor {
    private readonly binaryPath: string;
    private readonly socketTimeoutSeconds: number;

    constructor(options: YtDlpExtractorOptions = {}) {
        this.binaryPath = options.binaryPath || 'yt-dlp';
        this.socketTimeoutSeconds = options.socketTimeoutSeconds || 15;
    }

    async probe(url: string, options: VideoExtractorOptions): Promise<VideoProbe> {
        const validUrl = UrlSchema.parse(url);
        const args = [
            '--dump-json',
            '--no-playlist',
            '--no-warnings',
            '--skip-download',
            '-f', FORMAT_SELECTOR,
            '--socket-timeout', String(this.socketTimeoutSeconds),
            ...this.cookieArgs(options),
            '--', validUrl,
        ];

        const output = await this.execute(args, options);

        let json: unknown;
        try {
            json = JSON.parse(output);
        } catch (error) {
            throw new ExtractorError('yt-dlp returned unreadable metadata', { cause: error });
        }

        const info = InfoSchema.parse(json);
        return {
            title: info.title || 'download',
            extension: info.ext || 'mp4',
            sizeBytes: estimateSize(info),
        };
    }

    async download(url: string, outputTemplate: string, options: VideoExtractorOptions): Promise<string> {
        const validUrl = UrlSchema.parse(url);
        const args = [
            '-f', FORMAT_SELECTOR,
            '--merge-output-format', 'mp4',
            '-o', outputTemplate,
            '--no-playlist',
            '--no-mtime',
            '--no-warnings',
            '--no-progress',
            '--socket-timeout', String(this.socketTimeoutSeconds),
            ...this.cookieArgs(options),
        ];

        if (options.maxBytes !== undefined) {
            args.push('--max-filesize', String(options.maxBytes));
        }

        args.push('--', validUrl);
        return this.execute(args, options);
    }

    private cookieArgs(options: VideoExtractorOptions): string[] {
        return options.cookiesPath ? ['--cookies', options.cookiesPath] : [];
    }

    /**
     * Execute yt-dlp; kills the process on abort or timeout
     */
    private execute(args: string[], options: VideoExtractorOptions): Promise<string> {
        return new Promise((resolve, reject) => {
            let output = '';
            let errorOutput = '';
            let timedOut = false;
            let settled = false;

            const proc = spawn(this.binaryPath, args, {
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            const kill = (): void => {
                if (!proc.killed) proc.kill('SIGKILL');
            };
            const onAbort = (): void => kill();

            const timer = setTimeout(() => {
                timedOut = true;
                kill();
            }, options.timeoutMs);

            if (options.signal?.aborted) {
                kill();
            } else {
                options.signal?.addEventListener('abort', onAbort, { once: true });
            }

            const finish = (error: ExtractorError | undefined): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                options.signal?.removeEventListener('abort', onAbort);
                if (error) reject(error);
                else resolve(output);
            };

            proc.stdout.on('data', (data: Buffer) => {
                output += data.toString();
            });

            proc.stderr.on('data', (data: Buffer) => {
                errorOutput += data.toString();
            });

            proc.on('close', (code) => {
                if (code === 0) {
                    finish(undefined);
                } else if (timedOut) {
                    finish(new ExtractorError(`yt-dlp timed out after ${options.timeoutMs}ms`, {
                        exitCode: code,
                        killed: true,
                        timedOut: true,
                    }));
                } else if (proc.killed) {
                    finish(new ExtractorError('Process cancelled', { exitCode: code, killed: true }));
                } else {
                    logger.debug('yt-dlp exited with an error', { code, stderr: errorOutput.slice(0, 500) });
                    finish(new ExtractorError(errorOutput.trim() || `yt-dlp exited with code ${code}`, {
                        exitCode: code,
                    }));
                }
            });

            proc.on('error', (error) => {
                finish(new ExtractorError(`Failed to start yt-dlp: ${error.message}`, { cause: error }));
            });
        });
    }
}

/**
 * filesize_approx, then filesize, then the sum of the requested video/audio formats
 */
export function estimateSize(info: YtDlpInfo): number | undefined {
    const direct = info.filesize_approx || info.filesize;
    if (direct) return direct;

    const formats = info.requested_formats || [];
    const total = formats.reduce(
        (sum, format) => sum + (format?.filesize || format?.filesize_approx || 0),
        0,
    );
    return total > 0 ? total : undefined;
}
