import express from 'express';
import cors from 'cors';
import { createServer, Server as HttpServer } from 'http';
import { ConfigManager, validateConfig } from './config/ConfigManager.js';
import { AppConfig } from './config/types.js';
import { RATE_LIMITS } from './config/constants.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { CatalogOrchestrator } from './services/catalog/CatalogOrchestrator.js';
import { MusicBrainzClient } from './services/providers/musicbrainz/MusicBrainzClient.js';
import { WikipediaClient } from './services/providers/wikipedia/WikipediaClient.js';
import { DiscogsClient } from './services/providers/discogs/DiscogsClient.js';
import {
  BiographyProvider,
  PrimaryMetadataProvider,
  ReviewProvider,
} from './types/providers/index.js';
import { securityMiddleware, rateLimitByIp } from './middleware/security.js';
import { requestLoggingMiddleware, errorLoggingMiddleware, logger } from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createCatalogRouter } from './routes/api.js';

/**
 * Provider clients used by the orchestrator. Anything not supplied is built
 * from configuration.
 */
export interface CatalogProviders {
  primary: PrimaryMetadataProvider;
  biography: BiographyProvider;
  reviews: ReviewProvider;
}

export interface AppOptions {
  config?: AppConfig;
  providers?: Partial<CatalogProviders>;
}

export class App {
  public express: express.Application;
  private httpServer: HttpServer;
  private config: AppConfig;
  private dbManager: DatabaseManager;
  private providers: Partial<CatalogProviders>;
  private initialized = false;

  constructor(options: AppOptions = {}) {
    this.express = express();
    this.httpServer = createServer(this.express);
    this.config = options.config ?? ConfigManager.getInstance().getConfig();
    this.dbManager = new DatabaseManager(this.config.database);
    this.providers = options.providers ?? {};

    this.initializeMiddleware();
    // Catalog routes and error handling are mounted in initialize(), after
    // the repository is connected
  }

  private initializeMiddleware(): void {
    // Trust proxy for rate limiting and IP detection
    this.express.set('trust proxy', 1);

    // Security middleware
    this.express.use(securityMiddleware);

    // CORS
    this.express.use(
      cors({
        origin: this.config.server.corsOrigin,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
        maxAge: 86400,
      })
    );

    this.express.use(express.json({ limit: '1mb' }));

    // Request logging
    this.express.use(requestLoggingMiddleware);

    // Rate limiting
    this.express.use(rateLimitByIp(RATE_LIMITS.API_WINDOW, RATE_LIMITS.API_MAX_REQUESTS));
  }

  private createProviders(): CatalogProviders {
    const { musicbrainz, wikipedia, discogs } = this.config.providers;

    const primary = this.providers.primary ?? new MusicBrainzClient({
      appName: musicbrainz.appName,
      appVersion: musicbrainz.appVersion,
      contact: musicbrainz.contact,
      baseUrl: musicbrainz.baseUrl,
      timeoutMs: musicbrainz.timeoutSeconds * 1000,
      requestsPerSecond: musicbrainz.requestsPerSecond,
    });

    const biography = this.providers.biography ?? new WikipediaClient({
      baseUrl: wikipedia.baseUrl,
      userAgent: wikipedia.userAgent
        ?? `${musicbrainz.appName}/${musicbrainz.appVersion} ( ${musicbrainz.contact} )`,
      timeoutMs: wikipedia.timeoutSeconds * 1000,
    });

    const reviews = this.providers.reviews ?? new DiscogsClient({
      baseUrl: discogs.baseUrl,
      userAgent: `${musicbrainz.appName}/${musicbrainz.appVersion}`,
      token: discogs.token,
      consumerKey: discogs.consumerKey,
      consumerSecret: discogs.consumerSecret,
      timeoutMs: discogs.timeoutSeconds * 1000,
    });

    return { primary, biography, reviews };
  }

  private initializeErrorHandling(): void {
    // Error logging middleware
    this.express.use(errorLoggingMiddleware);

    // 404 handler
    this.express.use(notFoundHandler);

    // Global error handler
    this.express.use(errorHandler);
  }

  /**
   * Connect the repository, build the orchestrator and mount the routes.
   * Idempotent; start() calls it before listening.
   */
  public async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const repository = await this.dbManager.connect();
    logger.info('Repository connected', { driver: repository.driver });

    const providers = this.createProviders();
    const orchestrator = new CatalogOrchestrator({
      repository,
      primary: providers.primary,
      biography: providers.biography,
      reviews: providers.reviews,
    });

    this.express.use(createCatalogRouter(orchestrator, repository));
    logger.info('Catalog routes initialized');

    // Error handling (MUST be after all routes)
    this.initializeErrorHandling();

    this.initialized = true;
  }

  public async start(): Promise<void> {
    const warnings = validateConfig(this.config);
    for (const warning of warnings) {
      logger.warn(warning);
    }

    await this.initialize();

    const { port, host } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    logger.info(`Catalog server started on ${host}:${port}`);
    logger.info(`Environment: ${this.config.server.env}`);
    logger.info(`Storage: ${this.config.database.driver}`);
  }

  public async stop(): Promise<void> {
    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close(error => (error ? reject(error) : resolve()));
      });
      logger.info('HTTP server closed');
    }

    await this.dbManager.disconnect();
    logger.info('Server stopped gracefully');
  }

  public getDatabaseManager(): DatabaseManager {
    return this.dbManager;
  }
}
