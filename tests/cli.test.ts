import fs from 'fs';
import os from 'os';
import path from 'path';
import { EXIT_FAILURE, EXIT_INVALID_URL, EXIT_OK, run } from '../src/index';
import { DownloadOrchestrator } from '../src/download/core/DownloadOrchestrator';
import { ProviderManager } from '../src/download/core/ProviderManager';
import { ErrorKind, MediaRouteError } from '../src/download/core/errors';
import { payloadOf, stubProvider } from './helpers/fakes';

describe('Command line entry', () => {
    let outputDir: string;
    let stdout: string[];
    let stderr: string[];
    const io = {
        stdout: (line: string) => stdout.push(line),
        stderr: (line: string) => stderr.push(line),
    };

    beforeEach(() => {
        outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-router-cli-'));
        stdout = [];
        stderr = [];
    });

    afterEach(() => {
        fs.rmSync(outputDir, { recursive: true, force: true });
    });

    function orchestratorWith(fetch: Parameters<typeof stubProvider>[1]) {
        return new DownloadOrchestrator({
            providers: new ProviderManager().register(stubProvider('generic-http', fetch)),
        });
    }

    it('should write the artifact to the output directory', async () => {
        const orchestrator = orchestratorWith(async () => payloadOf('hello', { suggestedName: 'note.txt' }));

        const code = await run(['https://example.com/note.txt', outputDir], orchestrator, { io });

        const target = path.join(outputDir, 'note.txt');
        expect(code).toBe(EXIT_OK);
        expect(stdout).toEqual([target]);
        expect(fs.readFileSync(target, 'utf-8')).toBe('hello');
    });

    it('should exit with 2 for invalid URLs', async () => {
        const orchestrator = orchestratorWith(async () => payloadOf('never'));

        const code = await run(['ftp://example.com/a', outputDir], orchestrator, { io });

        expect(code).toBe(EXIT_INVALID_URL);
        expect(stderr).toEqual(['Invalid URL: only http:// and https:// links are supported']);
    });

    it('should print usage without a URL', async () => {
        const code = await run([], orchestratorWith(async () => payloadOf('never')), { io });

        expect(code).toBe(EXIT_INVALID_URL);
        expect(stderr).toEqual(['Usage: media-router <url> [outputDir]']);
    });

    it('should exit with 1 and print the report for other failures', async () => {
        const orchestrator = orchestratorWith(async () => {
            throw new MediaRouteError(ErrorKind.NotFound, 'The video was not found', { providerId: 'generic-http' });
        });

        const code = await run(['https://example.com/gone.mp4', outputDir], orchestrator, { io });

        expect(code).toBe(EXIT_FAILURE);
        expect(stderr).toEqual(['The video was not found']);
        expect(fs.readdirSync(outputDir)).toEqual([]);
    });
});
