/**
 * Extension <-> MIME lookup used when a provider does not declare a usable content type
 */

export const DEFAULT_MIME = 'application/octet-stream';

const EXTENSION_TO_MIME: ReadonlyMap<string, string> = new Map(Object.entries({
    // Video
    mp4: 'video/mp4',
    m4v: 'video/x-m4v',
    mov: 'video/quicktime',
    webm: 'video/webm',
    mkv: 'video/x-matroska',
    avi: 'video/x-msvideo',
    flv: 'video/x-flv',
    '3gp': 'video/3gpp',

    // Audio
    mp3: 'audio/mpeg',
    m4a: 'audio/mp4',
    aac: 'audio/aac',
    wav: 'audio/wav',
    ogg: 'audio/ogg',
    oga: 'audio/ogg',
    opus: 'audio/opus',
    flac: 'audio/flac',
    weba: 'audio/webm',

    // Images
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    png: 'image/png',
    gif: 'image/gif',
    webp: 'image/webp',
    avif: 'image/avif',
    bmp: 'image/bmp',
    svg: 'image/svg+xml',
    heic: 'image/heic',

    // Documents
    pdf: 'application/pdf',
    zip: 'application/zip',
    json: 'application/json',
    txt: 'text/plain',
    html: 'text/html',
    csv: 'text/csv',
}));

// First extension listed for a MIME type wins
const MIME_TO_EXTENSION = new Map<string, string>();
for (const [extension, mime] of EXTENSION_TO_MIME) {
    if (!MIME_TO_EXTENSION.has(mime)) {
        MIME_TO_EXTENSION.set(mime, extension);
    }
}

export function getMimeFromExtension(extension: string): string | undefined {
    return EXTENSION_TO_MIME.get(extension.toLowerCase());
}

export function getExtensionFromMime(mimeType: string): string | undefined {
    return MIME_TO_EXTENSION.get(normalizeMime(mimeType));
}

/**
 * Strip parameters ("; charset=...") and lowercase
 */
export function normalizeMime(contentType: string): string {
    return (contentType.split(';')[0] ?? '').trim().toLowerCase();
}

/**
 * Top-level family of a MIME type: "video/mp4" -> "video"
 */
export function getMimeFamily(mimeType: string): string {
    return normalizeMime(mimeType).split('/')[0] ?? '';
}
