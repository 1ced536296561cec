import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 8080,
    host: '0.0.0.0',
    env: 'development',
    shutdownTimeoutSeconds: 10,
    corsOrigin: 'http://localhost:4200',
  },
  database: {
    driver: 'sqlite',
    filename: './data/catalog.sqlite',
  },
  providers: {
    musicbrainz: {
      baseUrl: 'https://musicbrainz.org/ws/2',
      appName: 'linernotes',
      appVersion: 'dev',
      contact: 'dev@localhost',
      timeoutSeconds: 6,
      requestsPerSecond: 1, // MusicBrainz allows 1 request per second per client
    },
    wikipedia: {
      baseUrl: 'https://en.wikipedia.org/api/rest_v1',
      timeoutSeconds: 10,
    },
    discogs: {
      baseUrl: 'https://api.discogs.com',
      timeoutSeconds: 10,
    },
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSizeMb: 10,
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
