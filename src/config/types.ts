export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
  shutdownTimeoutSeconds: number;
  corsOrigin: string;
}

export interface DatabaseConfig {
  driver: 'sqlite' | 'memory';
  filename: string;
}

export interface ProviderConfig {
  musicbrainz: {
    baseUrl: string;
    appName: string;
    appVersion: string;
    contact: string;
    timeoutSeconds: number;
    requestsPerSecond: number;
  };
  wikipedia: {
    baseUrl: string;
    userAgent?: string | undefined;
    timeoutSeconds: number;
  };
  discogs: {
    baseUrl: string;
    token?: string | undefined;
    consumerKey?: string | undefined;
    consumerSecret?: string | undefined;
    timeoutSeconds: number;
  };
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSizeMb: number;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  providers: ProviderConfig;
  logging: LoggingConfig;
}
