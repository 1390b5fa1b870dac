/**
 * Provider index - exports all retrieval providers
 */

export { BaseProvider } from './BaseProvider';
export type { BaseProviderOptions } from './BaseProvider';
export { GenericHttpProvider } from './GenericHttpProvider';
export { GoogleDriveProvider } from './GoogleDriveProvider';
export { ShortVideoApiProvider } from './ShortVideoApiProvider';
export { SocialPostProvider } from './SocialPostProvider';
export { VideoExtractorProvider, classifyExtractorFailure } from './VideoExtractorProvider';
