/**
 * Property-Based Tests for Filename Sanitization
 */

import fc from 'fast-check';
import {
    FALLBACK_FILENAME,
    MAX_FILENAME_LENGTH,
    getExtension,
    sanitize,
} from '../src/download/security/FileSanitizer';

const ILLEGAL = /[\\/*?:"<>|]/;

describe('Filename Sanitizer', () => {
    describe('Properties', () => {
        const anyName = fc.oneof(
            fc.string(),
            fc.string({ minLength: 140, maxLength: 400 }),
            fc.fullUnicodeString(),
            fc.stringOf(fc.constantFrom('.', ' ', '/', '\\', 'a', ':', '*', 'b', '?')),
        );

        it('should never return an empty name', () => {
            fc.assert(fc.property(anyName, (raw) => sanitize(raw).length > 0), { numRuns: 300 });
        });

        it('should never contain reserved characters', () => {
            fc.assert(fc.property(anyName, (raw) => !ILLEGAL.test(sanitize(raw))), { numRuns: 300 });
        });

        it('should stay within the length limit', () => {
            fc.assert(
                fc.property(anyName, (raw) => sanitize(raw).length <= MAX_FILENAME_LENGTH),
                { numRuns: 300 },
            );
        });

        it('should be idempotent', () => {
            fc.assert(
                fc.property(anyName, (raw) => {
                    const once = sanitize(raw);
                    expect(sanitize(once)).toBe(once);
                }),
                { numRuns: 300 },
            );
        });
    });

    describe('Examples', () => {
        it('should return the fallback name for empty input', () => {
            expect(sanitize('')).toBe(FALLBACK_FILENAME);
        });

        it('should return the fallback name when only dots and spaces remain', () => {
            expect(sanitize(' ... ')).toBe(FALLBACK_FILENAME);
        });

        it('should preserve the extension when truncating', () => {
            const result = sanitize(`${'a'.repeat(300)}.mp4`);
            expect(result).toBe(`${'a'.repeat(146)}.mp4`);
            expect(result).toHaveLength(MAX_FILENAME_LENGTH);
        });

        it('should replace reserved characters with underscores', () => {
            expect(sanitize('my:video/clip?.mp4')).toBe('my_video_clip_.mp4');
        });

        it('should collapse consecutive dots', () => {
            expect(sanitize('clip...final..mp4')).toBe('clip.final.mp4');
        });

        it('should trim edge whitespace and dots', () => {
            expect(sanitize('  .hidden name.  ')).toBe('hidden name');
        });

        it('should cut names without an extension to the limit', () => {
            expect(sanitize('b'.repeat(200))).toBe('b'.repeat(150));
        });
    });

    describe('getExtension', () => {
        it('should lowercase the extension', () => {
            expect(getExtension('Movie.MP4')).toBe('mp4');
        });

        it('should return empty for names without one', () => {
            expect(getExtension('README')).toBe('');
            expect(getExtension('.env')).toBe('');
            expect(getExtension('trailing.')).toBe('');
        });
    });
});
