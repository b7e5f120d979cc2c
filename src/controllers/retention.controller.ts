import type { NextFunction, Request, Response } from 'express';
import type { CompositionRoot } from '../app/composition-root';
import { policyChangeNotice } from '../services/retention-policy.service';
import type { ChannelId, ChannelPolicy, ScanCycleSummary, WorkerState } from '../types/retention.types';
import { NotFoundError, errorMessage } from '../utils/errors';
import { failFromZod, ok } from '../utils/api-response';
import { channelIdParamsSchema, channelPolicySchema, retentionSettingsSchema } from '../utils/validation.schemas';
import { logger } from '../utils/logger';

export interface RetentionStatusResponse {
  state: WorkerState;
  scanIntervalMinutes: number;
  bulkDeleteMin: number;
  managedChannels: number;
  lastCycle: ScanCycleSummary | null;
}

export interface ManagedChannel {
  channelId: ChannelId;
  policy: ChannelPolicy;
}

export function createRetentionController(root: CompositionRoot) {
  const { store, worker, platform } = root;

  // Tells the channel's members about the new limits; a failure only costs the notice.
  async function notifyPolicyChange(channelId: ChannelId, policy: ChannelPolicy): Promise<boolean> {
    const text = policyChangeNotice(policy);
    if (!text) return false;
    try {
      const channel = await platform.resolveChannel(channelId);
      if (!channel) return false;
      await platform.sendNotice(channel, text);
      return true;
    } catch (error) {
      logger.warn('retention.admin.notice_failed', { channelId, error: errorMessage(error) });
      return false;
    }
  }

  return {
    /**
     * GET /api/v1/retention/status
     */
    async getStatus(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const [scanIntervalMinutes, bulkDeleteMin, channels] = await Promise.all([
          store.getScanInterval(),
          store.getBulkDeleteMin(),
          store.getChannels(),
        ]);
        const status: RetentionStatusResponse = {
          state: worker.getState(),
          scanIntervalMinutes,
          bulkDeleteMin,
          managedChannels: channels.length,
          lastCycle: worker.lastSummary(),
        };
        ok(res, status);
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/v1/retention/channels
     */
    async listChannels(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const channels: ManagedChannel[] = [];
        for (const channelId of await store.getChannels()) {
          const policy = await store.getChannelPolicy(channelId);
          if (policy) channels.push({ channelId, policy });
        }
        ok(res, { channels });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/v1/retention/channels/:channelId
     */
    async getChannelPolicy(req: Request, res: Response, next: NextFunction): Promise<void> {
      const params = channelIdParamsSchema.safeParse(req.params);
      if (!params.success) {
        failFromZod(res, params.error, 'params');
        return;
      }
      try {
        const policy = await store.getChannelPolicy(params.data.channelId);
        if (!policy) throw new NotFoundError(`Channel ${params.data.channelId} is not managed`);
        const managed: ManagedChannel = { channelId: params.data.channelId, policy };
        ok(res, managed);
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/v1/retention/channels/:channelId/estimate
     */
    async getChannelEstimate(req: Request, res: Response, next: NextFunction): Promise<void> {
      const params = channelIdParamsSchema.safeParse(req.params);
      if (!params.success) {
        failFromZod(res, params.error, 'params');
        return;
      }
      try {
        ok(res, await worker.estimateChannel(params.data.channelId));
      } catch (error) {
        next(error);
      }
    },

    /**
     * PUT /api/v1/retention/channels/:channelId
     * Stores the policy, then announces it in the channel.
     */
    async putChannelPolicy(req: Request, res: Response, next: NextFunction): Promise<void> {
      const params = channelIdParamsSchema.safeParse(req.params);
      if (!params.success) {
        failFromZod(res, params.error, 'params');
        return;
      }
      const body = channelPolicySchema.safeParse(req.body);
      if (!body.success) {
        failFromZod(res, body.error);
        return;
      }
      try {
        await store.setChannelPolicy(params.data.channelId, body.data);
        logger.info('retention.admin.policy_set', { channelId: params.data.channelId, ...body.data });
        const notified = await notifyPolicyChange(params.data.channelId, body.data);
        ok(res, { channelId: params.data.channelId, policy: body.data, notified });
      } catch (error) {
        next(error);
      }
    },

    /**
     * DELETE /api/v1/retention/channels/:channelId
     */
    async deleteChannelPolicy(req: Request, res: Response, next: NextFunction): Promise<void> {
      const params = channelIdParamsSchema.safeParse(req.params);
      if (!params.success) {
        failFromZod(res, params.error, 'params');
        return;
      }
      try {
        await store.clearChannel(params.data.channelId);
        logger.info('retention.admin.policy_cleared', { channelId: params.data.channelId });
        ok(res, { channelId: params.data.channelId, cleared: true });
      } catch (error) {
        next(error);
      }
    },

    /**
     * PUT /api/v1/retention/settings
     */
    async putSettings(req: Request, res: Response, next: NextFunction): Promise<void> {
      const body = retentionSettingsSchema.safeParse(req.body);
      if (!body.success) {
        failFromZod(res, body.error);
        return;
      }
      try {
        const { scanIntervalMinutes, bulkDeleteMin } = body.data;
        if (scanIntervalMinutes !== undefined) await store.setScanInterval(scanIntervalMinutes);
        if (bulkDeleteMin !== undefined) await store.setBulkDeleteMin(bulkDeleteMin);
        logger.info('retention.admin.settings_updated', body.data);
        ok(res, {
          scanIntervalMinutes: await store.getScanInterval(),
          bulkDeleteMin: await store.getBulkDeleteMin(),
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/v1/retention/refresh
     * Runs a scan cycle now; 409 while another one is running.
     */
    async postRefresh(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        ok(res, await worker.runCycle('manual'));
      } catch (error) {
        next(error);
      }
    },
  };
}
