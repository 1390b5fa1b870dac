export interface ProviderSettings {
  shortVideoApiUrl: string;
  ytDlpPath: string;
  userAgent: string;
}

export interface AppConfig {
  logLevel: string;
  tempDirectory: string;
  cookiesFile: string;
  cookiesContent?: string;
  requestTimeout: number;
  downloadTimeout: number;
  maxFileSize: number;
  sentryDsn?: string;
  providers: ProviderSettings;
}
