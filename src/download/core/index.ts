/**
 * Core index - exports all core components
 */

export * from './types';
export * from './errors';
export { classify, classifyHost, normalizeHost, isKnownVideoHost, KNOWN_VIDEO_DOMAINS } from './UrlClassifier';
export { ProviderManager } from './ProviderManager';
export { ResultAssembler } from './ResultAssembler';
export type { ArtifactDescription, ResultAssemblerOptions } from './ResultAssembler';
export { DownloadOrchestrator } from './DownloadOrchestrator';
export type { Classifier, DownloadOrchestratorOptions } from './DownloadOrchestrator';
