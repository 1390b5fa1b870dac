/**
 * FileSanitizer - Makes provider-suggested names safe to use as a filename
 * Pure and idempotent: sanitize(sanitize(x)) === sanitize(x)
 */

export const FALLBACK_FILENAME = 'downloaded_file';
export const MAX_FILENAME_LENGTH = 150;

const ILLEGAL_CHARACTERS = /[\\/*?:"<>|\x00-\x1F]/g;
const EDGE_NOISE = /^[\s.]+|[\s.]+$/g;
const TRAILING_NOISE = /[\s.]+$/;

/**
 * Sanitize a filename for common filesystems
 */
export function sanitize(raw: string): string {
    const cleaned = raw
        // Replace characters reserved on Windows/POSIX and control characters
        .replace(ILLEGAL_CHARACTERS, '_')
        // Collapse runs of dots (also defuses "..")
        .replace(/\.+/g, '.')
        // Remove leading/trailing dots and whitespace
        .replace(EDGE_NOISE, '');

    if (!cleaned) {
        return FALLBACK_FILENAME;
    }

    if (cleaned.length <= MAX_FILENAME_LENGTH) {
        return cleaned;
    }

    return truncatePreservingExtension(cleaned);
}

function truncatePreservingExtension(name: string): string {
    const dotIndex = name.lastIndexOf('.');
    const extension = dotIndex > 0 ? name.substring(dotIndex) : '';

    if (!extension || extension.length >= MAX_FILENAME_LENGTH) {
        return name.substring(0, MAX_FILENAME_LENGTH).replace(TRAILING_NOISE, '');
    }

    const stem = name
        .substring(0, Math.min(dotIndex, MAX_FILENAME_LENGTH - extension.length))
        .replace(TRAILING_NOISE, '');

    return `${stem}${extension}`;
}

/**
 * Extension of a filename without the dot, lowercased; empty when there is none
 */
export function getExtension(filename: string): string {
    const dotIndex = filename.lastIndexOf('.');
    if (dotIndex <= 0 || dotIndex === filename.length - 1) return '';
    return filename.substring(dotIndex + 1).toLowerCase();
}
