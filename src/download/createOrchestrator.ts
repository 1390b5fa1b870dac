/**
 * Wires the five providers, classifier and assembler from application config
 */

import { AppConfig } from '../types';
import { FileManager } from '../utils/FileManager';
import { DownloadOrchestrator } from './core/DownloadOrchestrator';
import { ProviderManager } from './core/ProviderManager';
import { CredentialBlob, FetchImpl } from './core/types';
import { InstagramPostExtractor } from './extractors/InstagramPostExtractor';
import { YtDlpExtractor } from './extractors/YtDlpExtractor';
import { PostExtractor, VideoExtractor } from './extractors/types';
import { GenericHttpProvider } from './providers/GenericHttpProvider';
import { GoogleDriveProvider } from './providers/GoogleDriveProvider';
import { ShortVideoApiProvider } from './providers/ShortVideoApiProvider';
import { SocialPostProvider } from './providers/SocialPostProvider';
import { VideoExtractorProvider } from './providers/VideoExtractorProvider';

export interface OrchestratorDependencies {
    credential?: CredentialBlob;
    fetchImpl?: FetchImpl;
    postExtractor?: PostExtractor;
    videoExtractor?: VideoExtractor;
}

export function createProviderManager(
    config: AppConfig,
    dependencies: OrchestratorDependencies = {},
): ProviderManager {
    const shared = {
        fetchImpl: dependencies.fetchImpl,
        requestTimeout: config.requestTimeout,
        downloadTimeout: config.downloadTimeout,
        userAgent: config.providers.userAgent,
    };

    const generic = new GenericHttpProvider(shared);
    const postExtractor = dependencies.postExtractor ?? new InstagramPostExtractor({
        fetchImpl: dependencies.fetchImpl,
        timeoutMs: config.requestTimeout,
        userAgent: config.providers.userAgent,
    });
    const videoExtractor = dependencies.videoExtractor ?? new YtDlpExtractor({
        binaryPath: config.providers.ytDlpPath,
        socketTimeoutSeconds: Math.ceil(config.requestTimeout / 1000),
    });

    return new ProviderManager()
        .register(generic)
        .register(new GoogleDriveProvider(generic, shared))
        .register(new ShortVideoApiProvider({ ...shared, apiUrl: config.providers.shortVideoApiUrl }))
        .register(new SocialPostProvider(postExtractor, shared))
        .register(new VideoExtractorProvider(videoExtractor, {
            ...shared,
            fileManager: new FileManager(config.tempDirectory),
        }));
}

export function createOrchestrator(
    config: AppConfig,
    dependencies: OrchestratorDependencies = {},
): DownloadOrchestrator {
    return new DownloadOrchestrator({
        providers: createProviderManager(config, dependencies),
        credential: dependencies.credential,
        maxBytes: config.maxFileSize,
    });
}
