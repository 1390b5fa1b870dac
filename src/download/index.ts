/**
 * Download System - Main Entry Point
 */

// Core components
export * from './core';

// Providers
export * from './providers';

// Extractors
export * from './extractors/types';
export { InstagramPostExtractor } from './extractors/InstagramPostExtractor';
export { YtDlpExtractor } from './extractors/YtDlpExtractor';

// Security
export * from './security';

export { createOrchestrator, createProviderManager } from './createOrchestrator';
export type { OrchestratorDependencies } from './createOrchestrator';
