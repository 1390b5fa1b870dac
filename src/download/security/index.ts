/**
 * Security module exports
 */

export { sanitize, getExtension, FALLBACK_FILENAME, MAX_FILENAME_LENGTH } from './FileSanitizer';
export * from './mimeTypes';
