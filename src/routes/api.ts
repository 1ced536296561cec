import { Router } from 'express';
import { CatalogController } from '../controllers/catalogController.js';
import { CatalogOrchestrator } from '../services/catalog/CatalogOrchestrator.js';
import { Repository } from '../types/database.js';

// Initialize router factory function
export const createCatalogRouter = (
  orchestrator: CatalogOrchestrator,
  repository: Repository
): Router => {
  const router = Router();

  const catalogController = new CatalogController(orchestrator);

  // Health check (no upstream access)
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      storage: repository.driver,
      timestamp: new Date().toISOString(),
    });
  });

  // Catalog routes
  router.get('/artists/:id', (req, res, next) => catalogController.getArtist(req, res, next));
  router.get('/albums/:id', (req, res, next) => catalogController.getAlbum(req, res, next));
  router.get('/search', (req, res, next) => catalogController.search(req, res, next));

  return router;
};
