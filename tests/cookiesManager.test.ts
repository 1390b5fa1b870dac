import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    CookiesManager,
    cookieHeaderFor,
    decodeCookiesContent,
    parseNetscapeCookies,
} from '../src/utils/CookiesManager';
import { CredentialBlob } from '../src/download/core/types';

const JAR = [
    '# Netscape HTTP Cookie File',
    '',
    '.youtube.com\tTRUE\t/\tTRUE\t0\tPREF\tf1=50000000',
    '#HttpOnly_.Instagram.com\tTRUE\t/\tTRUE\t2000000000\tsessionid\ttest-session',
    'malformed line without tabs',
    'example.com\tFALSE\t/\tFALSE\tnever\tbad\tx',
].join('\n');

describe('Cookies Manager', () => {
    describe('Netscape parsing', () => {
        it('should skip comments and malformed lines and keep HttpOnly cookies', () => {
            expect(parseNetscapeCookies(JAR)).toEqual([
                {
                    domain: '.youtube.com',
                    includeSubdomains: true,
                    path: '/',
                    secure: true,
                    expires: 0,
                    name: 'PREF',
                    value: 'f1=50000000',
                },
                {
                    domain: '.instagram.com',
                    includeSubdomains: true,
                    path: '/',
                    secure: true,
                    expires: 2000000000,
                    name: 'sessionid',
                    value: 'test-session',
                },
            ]);
        });

        it('should accept CRLF line endings', () => {
            expect(parseNetscapeCookies(JAR.replace(/\n/g, '\r\n'))).toHaveLength(2);
        });
    });

    describe('Content decoding', () => {
        it('should pass plaintext through', () => {
            expect(decodeCookiesContent('a\tb')).toBe('a\tb');
        });

        it('should decode base64 content', () => {
            expect(decodeCookiesContent(Buffer.from(JAR).toString('base64'))).toBe(JAR);
        });
    });

    describe('Cookie headers', () => {
        const credential: CredentialBlob = { path: '/tmp/c.txt', cookies: parseNetscapeCookies(JAR) };

        it('should include cookies for the domain and its subdomains', () => {
            expect(cookieHeaderFor(credential, 'www.instagram.com', 0)).toBe('sessionid=test-session');
            expect(cookieHeaderFor(credential, 'instagram.com', 0)).toBe('sessionid=test-session');
        });

        it('should ignore look-alike hosts', () => {
            expect(cookieHeaderFor(credential, 'notinstagram.com', 0)).toBeUndefined();
        });

        it('should drop expired cookies', () => {
            expect(cookieHeaderFor(credential, 'www.instagram.com', 2000000001 * 1000)).toBeUndefined();
        });

        it('should return undefined without a credential', () => {
            expect(cookieHeaderFor(undefined, 'www.instagram.com')).toBeUndefined();
        });
    });

    describe('load', () => {
        let tempRoot: string;

        beforeEach(() => {
            tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'media-router-cookies-'));
        });

        afterEach(() => {
            fs.rmSync(tempRoot, { recursive: true, force: true });
        });

        it('should return undefined when the file is missing', () => {
            const manager = new CookiesManager({
                cookiesFile: path.join(tempRoot, 'missing.txt'),
                tempDirectory: tempRoot,
            });

            expect(manager.load()).toBeUndefined();
        });

        it('should load a frozen credential from the cookie file', () => {
            const cookiesFile = path.join(tempRoot, 'cookies.txt');
            fs.writeFileSync(cookiesFile, JAR);

            const credential = new CookiesManager({ cookiesFile, tempDirectory: tempRoot }).load();

            expect(credential?.path).toBe(path.resolve(cookiesFile));
            expect(credential?.cookies).toHaveLength(2);
            expect(Object.isFrozen(credential)).toBe(true);
            expect(Object.isFrozen(credential?.cookies)).toBe(true);
        });

        it('should write inline content to the temp directory', () => {
            const credential = new CookiesManager({
                cookiesFile: path.join(tempRoot, 'unused.txt'),
                cookiesContent: Buffer.from(JAR).toString('base64'),
                tempDirectory: path.join(tempRoot, 'nested'),
            }).load();

            const written = path.join(tempRoot, 'nested', 'cookies.txt');
            expect(credential?.path).toBe(path.resolve(written));
            expect(fs.readFileSync(written, 'utf-8')).toBe(JAR);
        });
    });
});
