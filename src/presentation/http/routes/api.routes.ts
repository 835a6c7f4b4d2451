import { Router } from 'express';
import { SettingsController } from '../controllers/SettingsController';
import { TrackerController } from '../controllers/TrackerController';

/**
 * Creates and configures the JSON API routes
 */
export function createApiRoutes(
  settingsController: SettingsController,
  trackerController: TrackerController
): Router {
  const router = Router();

  // Settings endpoints
  router.get('/config', (req, res, next) => settingsController.get(req, res).catch(next));
  router.post('/config', (req, res, next) => settingsController.update(req, res).catch(next));

  // Administrative actions
  router.post('/disable_and_reenable', (req, res, next) => trackerController.disableAndReenable(req, res).catch(next));
  router.post('/reenable_all', (req, res, next) => trackerController.reenableAll(req, res).catch(next));

  // Status endpoint
  router.get('/status', (req, res) => trackerController.status(req, res));

  return router;
}
