import type { PolicyStorePort } from '../services/ports/policy-store.port';
import type { ChatPlatformPort } from '../services/ports/chat-platform.port';
import type { RateLimitTracker } from '../services/rate-limit-tracker.service';
import type { DeletionBatchingEngine, Sleep } from '../services/deletion-batching.service';
import { defaultSleep } from '../services/deletion-batching.service';
import { collectDeletableMessages } from '../services/retention-policy.service';
import type {
  ChannelId,
  ChannelRef,
  ChannelScanResult,
  DeletableSet,
  ScanCycleSummary,
  WorkerState,
} from '../types/retention.types';
import { NotFoundError, ScanInProgressError, errorMessage } from '../utils/errors';
import { retentionMetrics } from '../metrics/retention.metrics';
import { logger } from '../utils/logger';

export const MIN_SCAN_INTERVAL_MINUTES = 2;

interface RetentionScanWorkerDeps {
  store: PolicyStorePort;
  platform: ChatPlatformPort;
  rateLimit: RateLimitTracker;
  deleter: DeletionBatchingEngine;
  sleep?: Sleep;
  now?: () => Date;
}

interface PlannedDeletion {
  channel: ChannelRef;
  messages: DeletableSet;
  result: ChannelScanResult;
}

export interface ChannelEstimate {
  channelId: ChannelId;
  channelName: string;
  deletable: number;
}

export function scanIntervalMs(configuredMinutes: number): number {
  return Math.max(configuredMinutes, MIN_SCAN_INTERVAL_MINUTES) * 60 * 1000;
}

/**
 * Periodic retention scan. One cycle evaluates every configured channel first and only
 * then deletes, channel by channel; a failure in one channel never stops the others.
 */
export class RetentionScanWorker {
  private started = false;
  private running = false;
  private state: WorkerState = 'idle';
  private last: ScanCycleSummary | null = null;
  private readonly store: PolicyStorePort;
  private readonly platform: ChatPlatformPort;
  private readonly rateLimit: RateLimitTracker;
  private readonly deleter: DeletionBatchingEngine;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(deps: RetentionScanWorkerDeps) {
    this.store = deps.store;
    this.platform = deps.platform;
    this.rateLimit = deps.rateLimit;
    this.deleter = deps.deleter;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  getState(): WorkerState {
    return this.state;
  }

  lastSummary(): ScanCycleSummary | null {
    return this.last;
  }

  /**
   * Enters the scan loop. Only the first call has an effect: the gateway may report
   * "ready" again after every reconnect. Resolves once the loop has been stopped.
   */
  async start(): Promise<void> {
    if (this.started) {
      logger.debug('retention.worker.already_started');
      return;
    }
    this.started = true;
    this.running = true;
    logger.info('retention.worker.started');

    while (this.running) {
      try {
        await this.runCycle('scheduled');
      } catch (error) {
        if (error instanceof ScanInProgressError) {
          logger.info('retention.scan.skipped_busy');
        } else {
          logger.error('retention.scan.uncaught', { error: errorMessage(error) });
        }
      }
      if (!this.running) break;
      const interval = await this.nextInterval();
      await this.sleep(interval);
    }
    logger.info('retention.worker.stopped');
  }

  stop(): void {
    this.running = false;
  }

  /**
   * One full pass over every configured channel. Rejected while another cycle runs.
   */
  async runCycle(trigger: ScanCycleSummary['trigger'] = 'manual'): Promise<ScanCycleSummary> {
    if (this.state === 'running') {
      throw new ScanInProgressError();
    }
    this.state = 'running';
    const started = this.now();
    logger.info('retention.scan.start', { trigger });

    try {
      const summary = await this.scanAndDelete(trigger, started);
      this.last = summary;
      retentionMetrics.recordCycle(trigger, 'ok');
      logger.info('retention.scan.complete', {
        trigger,
        channels: summary.channels.length,
        pruned: summary.pruned.length,
        durationMs: summary.durationMs,
      });
      return summary;
    } catch (error) {
      retentionMetrics.recordCycle(trigger, 'error');
      throw error;
    } finally {
      this.state = 'idle';
    }
  }

  /** Deletable count for one configured channel, without deleting anything. */
  async estimateChannel(channelId: ChannelId): Promise<ChannelEstimate> {
    const policy = await this.store.getChannelPolicy(channelId);
    if (!policy) throw new NotFoundError(`Channel ${channelId} is not managed`);
    const channel = await this.platform.resolveChannel(channelId);
    if (!channel) throw new NotFoundError(`Channel ${channelId} does not exist`);
    const messages = await collectDeletableMessages(this.platform, channel, policy, this.now());
    return { channelId, channelName: channel.name, deletable: messages.length };
  }

  private async scanAndDelete(trigger: ScanCycleSummary['trigger'], started: Date): Promise<ScanCycleSummary> {
    this.rateLimit.reset();
    const bulkDeleteMin = await this.store.getBulkDeleteMin();
    // Snapshot: pruning below must not disturb the iteration.
    const channelIds = [...(await this.store.getChannels())];
    const results: ChannelScanResult[] = [];
    const pruned: ChannelId[] = [];
    const planned: PlannedDeletion[] = [];

    for (const channelId of channelIds) {
      const policy = await this.store.getChannelPolicy(channelId);
      if (!policy) continue;

      let channel: ChannelRef | null;
      try {
        channel = await this.platform.resolveChannel(channelId);
      } catch (error) {
        logger.error('retention.channel.resolve_failed', { channelId, error: errorMessage(error) });
        results.push({ channelId, status: 'scan_failed', deletable: 0, error: errorMessage(error) });
        continue;
      }

      if (!channel) {
        logger.warn('retention.channel.missing', { channelId });
        try {
          await this.store.clearChannel(channelId);
        } catch (error) {
          logger.error('retention.channel.prune_failed', { channelId, error: errorMessage(error) });
          results.push({ channelId, status: 'scan_failed', deletable: 0, error: errorMessage(error) });
          continue;
        }
        retentionMetrics.recordPruned();
        pruned.push(channelId);
        results.push({ channelId, status: 'pruned', deletable: 0 });
        continue;
      }

      try {
        const messages = await collectDeletableMessages(this.platform, channel, policy, this.now());
        logger.info('retention.channel.scanned', { channelId, channelName: channel.name, deletable: messages.length });
        const result: ChannelScanResult = {
          channelId,
          channelName: channel.name,
          status: 'planned',
          deletable: messages.length,
        };
        results.push(result);
        planned.push({ channel, messages, result });
      } catch (error) {
        logger.error('retention.channel.scan_failed', {
          channelId,
          channelName: channel.name,
          error: errorMessage(error),
        });
        results.push({
          channelId,
          channelName: channel.name,
          status: 'scan_failed',
          deletable: 0,
          error: errorMessage(error),
        });
      }
    }

    for (const { channel, messages, result } of planned) {
      try {
        result.outcome = await this.deleter.deleteAll(channel, messages, bulkDeleteMin);
        result.status = 'deleted';
      } catch (error) {
        result.status = 'delete_failed';
        result.error = errorMessage(error);
        logger.error('retention.channel.delete_failed', {
          channelId: channel.id,
          channelName: channel.name,
          error: errorMessage(error),
        });
      }
    }

    const finished = this.now();
    return {
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
      trigger,
      channels: results,
      pruned,
    };
  }

  private async nextInterval(): Promise<number> {
    try {
      return scanIntervalMs(await this.store.getScanInterval());
    } catch (error) {
      logger.warn('retention.worker.interval_unavailable', { error: errorMessage(error) });
      return scanIntervalMs(MIN_SCAN_INTERVAL_MINUTES);
    }
  }
}
