/**
 * Retention admin routes: status, per-channel policies (read and write), server-wide
 * settings and manual refresh. Mounted under /api/v1/retention.
 */

import { Router } from 'express';
import type { CompositionRoot } from '../app/composition-root';
import { createRetentionController } from '../controllers/retention.controller';
import { requireAdminToken } from '../middleware/admin-auth.middleware';

export function createRetentionRoutes(root: CompositionRoot): Router {
  const router = Router();
  const controller = createRetentionController(root);

  router.use(requireAdminToken(root.adminApiToken));

  router.get('/status', controller.getStatus);
  router.get('/channels', controller.listChannels);
  router.get('/channels/:channelId', controller.getChannelPolicy);
  router.get('/channels/:channelId/estimate', controller.getChannelEstimate);
  router.put('/channels/:channelId', controller.putChannelPolicy);
  router.delete('/channels/:channelId', controller.deleteChannelPolicy);
  router.put('/settings', controller.putSettings);
  router.post('/refresh', controller.postRefresh);

  return router;
}
