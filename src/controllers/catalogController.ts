import { Request, Response, NextFunction } from 'express';
import { CatalogOrchestrator } from '../services/catalog/CatalogOrchestrator.js';
import { validateRequest } from '../middleware/validation.js';
import { entityIdParamSchema, searchQuerySchema } from '../validation/catalogSchemas.js';
import { logger } from '../middleware/logging.js';
import { ApplicationError } from '../errors/index.js';
import { createErrorLogContext } from '../utils/errorHandling.js';

/**
 * Abort signal tied to the client connection: aborted when the socket closes
 * before a response was written.
 */
function connectionSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export class CatalogController {
  constructor(private orchestrator: CatalogOrchestrator) {}

  /**
   * GET /artists/:id
   */
  async getArtist(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = validateRequest(req, entityIdParamSchema, 'params');
      const artist = await this.orchestrator.resolveArtist(id, { signal: connectionSignal(res) });
      res.json(artist);
    } catch (error) {
      this.logFailure('getArtist', error, req);
      next(error);
    }
  }

  /**
   * GET /albums/:id
   */
  async getAlbum(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = validateRequest(req, entityIdParamSchema, 'params');
      const album = await this.orchestrator.resolveAlbum(id, { signal: connectionSignal(res) });
      res.json(album);
    } catch (error) {
      this.logFailure('getAlbum', error, req);
      next(error);
    }
  }

  /**
   * GET /search?q=&limit=&offset=
   */
  async search(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { q, limit, offset } = validateRequest(req, searchQuerySchema, 'query');
      const result = await this.orchestrator.searchArtists(q, limit, offset, {
        signal: connectionSignal(res),
      });
      res.json(result);
    } catch (error) {
      this.logFailure('search', error, req);
      next(error);
    }
  }

  private logFailure(operation: string, error: unknown, req: Request): void {
    // Client errors are logged by the validation layer and error handler
    if (error instanceof ApplicationError && error.statusCode < 500) {
      return;
    }
    logger.error(
      `Catalog ${operation} failed`,
      createErrorLogContext(error, {
        controller: 'CatalogController',
        operation,
        path: req.path,
      })
    );
  }
}
