/**
 * Type definitions for the Media Router application layer
 */

export type { AppConfig, ProviderSettings } from './config';
