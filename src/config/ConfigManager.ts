import dotenv from 'dotenv';
import { AppConfig, DatabaseConfig, ProviderConfig, ServerConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Server configuration (HTTP_PORT is accepted as a fallback name)
    config.server.port = this.getNumber('PORT', this.getNumber('HTTP_PORT', config.server.port));
    config.server.host = this.getString('HOST', config.server.host);
    config.server.env = this.getEnum('NODE_ENV', config.server.env, [
      'development',
      'production',
      'test',
    ]);
    config.server.shutdownTimeoutSeconds = this.getNumber(
      'SHUTDOWN_TIMEOUT_SECONDS',
      config.server.shutdownTimeoutSeconds
    );
    config.server.corsOrigin = this.getString('CORS_ORIGIN', config.server.corsOrigin);

    // Database configuration
    config.database.driver = this.getEnum('DATABASE_DRIVER', config.database.driver, [
      'sqlite',
      'memory',
    ]);
    config.database.filename = this.getString('DATABASE_FILE', config.database.filename);

    // MusicBrainz
    const mb = config.providers.musicbrainz;
    mb.baseUrl = this.getString('MUSICBRAINZ_BASE_URL', mb.baseUrl);
    mb.appName = this.getString('MUSICBRAINZ_APP_NAME', mb.appName);
    mb.appVersion = this.getString('MUSICBRAINZ_APP_VERSION', mb.appVersion);
    mb.contact = this.getString('MUSICBRAINZ_CONTACT', mb.contact);
    mb.timeoutSeconds = this.getNumber('MUSICBRAINZ_TIMEOUT_SECONDS', mb.timeoutSeconds);
    mb.requestsPerSecond = this.getNumber('MUSICBRAINZ_REQUESTS_PER_SECOND', mb.requestsPerSecond);

    // Wikipedia
    const wiki = config.providers.wikipedia;
    wiki.baseUrl = this.getString('WIKIPEDIA_BASE_URL', wiki.baseUrl);
    wiki.userAgent = this.getOptional('WIKIPEDIA_USER_AGENT');
    wiki.timeoutSeconds = this.getNumber('WIKIPEDIA_TIMEOUT_SECONDS', wiki.timeoutSeconds);

    // Discogs credentials (optional)
    const discogs = config.providers.discogs;
    discogs.baseUrl = this.getString('DISCOGS_BASE_URL', discogs.baseUrl);
    discogs.token = this.getOptional('DISCOGS_TOKEN');
    discogs.consumerKey = this.getOptional('DISCOGS_CONSUMER_KEY');
    discogs.consumerSecret = this.getOptional('DISCOGS_CONSUMER_SECRET');
    discogs.timeoutSeconds = this.getNumber('DISCOGS_TIMEOUT_SECONDS', discogs.timeoutSeconds);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getOptional(key: string): string | undefined {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  }

  private getString(key: string, defaultValue?: string): string {
    const value = this.getOptional(key) ?? defaultValue;
    if (value === undefined) {
      throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
    }
    return value;
  }

  private getNumber(key: string, defaultValue?: number): number {
    const value = this.getOptional(key);
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue?: boolean): boolean {
    const value = this.getOptional(key);
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.getOptional(key);
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(candidate => candidate === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getServerConfig(): ServerConfig {
    return this.config.server;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  getProviderConfig(): ProviderConfig {
    return this.config.providers;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  /**
   * Throws on configuration the service cannot run with.
   * Returns warnings for settings that only degrade enrichment.
   */
  validate(): string[] {
    return validateConfig(this.config);
  }
}

/**
 * Throws ConfigurationError on settings the service cannot run with and
 * returns warnings for those that only degrade enrichment
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.providers.musicbrainz.contact.trim()) {
    errors.push('MusicBrainz contact is required (MUSICBRAINZ_CONTACT)');
  }

  if (config.server.port < 0 || config.server.port > 65535) {
    errors.push(`Port out of range: ${config.server.port}`);
  }

  const discogs = config.providers.discogs;
  if (!discogs.token && !(discogs.consumerKey && discogs.consumerSecret)) {
    warnings.push('Discogs credentials not provided - requests will be unauthenticated');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'validation',
      `Configuration validation failed:\n${errors.join('\n')}`
    );
  }

  return warnings;
}
