import { BULK_DELETE_MAX_AGE_MS, BULK_DELETE_MAX_MESSAGES } from './ports/chat-platform.port';
import type { ChatPlatformPort } from './ports/chat-platform.port';
import type { RateLimitTracker } from './rate-limit-tracker.service';
import type { ChannelMessage, ChannelRef, DeletionOutcome } from '../types/retention.types';
import { emptyOutcome } from '../types/retention.types';
import { BulkDeleteRejectedError, MessageNotFoundError, errorMessage } from '../utils/errors';
import { retentionMetrics } from '../metrics/retention.metrics';
import { logger } from '../utils/logger';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

interface DeletionBatchingDeps {
  platform: ChatPlatformPort;
  rateLimit: RateLimitTracker;
  sleep?: Sleep;
  now?: () => Date;
}

/**
 * Deletes the retention candidates of one channel with as few API calls as the
 * platform allows: bulk deletes of up to 100 recent messages, single deletes for
 * everything too old to bulk, and single deletes for small sets so routine cleanups
 * stay out of the moderation audit log.
 */
export class DeletionBatchingEngine {
  private readonly platform: ChatPlatformPort;
  private readonly rateLimit: RateLimitTracker;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(deps: DeletionBatchingDeps) {
    this.platform = deps.platform;
    this.rateLimit = deps.rateLimit;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async deleteAll(channel: ChannelRef, messages: readonly ChannelMessage[], bulkDeleteMin: number): Promise<DeletionOutcome> {
    const outcome = emptyOutcome();

    if (messages.length < bulkDeleteMin) {
      for (const message of messages) {
        await this.deleteOne(channel, message, outcome);
      }
      return outcome;
    }

    const bulkCutoff = this.now().getTime() - BULK_DELETE_MAX_AGE_MS;
    let batch: ChannelMessage[] = [];

    for (const message of messages) {
      if (message.createdAt.getTime() < bulkCutoff) {
        await this.deleteOne(channel, message, outcome);
        continue;
      }
      batch.push(message);
      if (batch.length === BULK_DELETE_MAX_MESSAGES) {
        await this.deleteBatch(channel, batch, outcome);
        batch = [];
      }
    }

    if (batch.length > 0) {
      await this.deleteBatch(channel, batch, outcome);
    }
    return outcome;
  }

  /**
   * One bulk call per chunk of at most 100 messages, each already known to be young
   * enough for bulk deletion. Falls back to single deletes when the call fails.
   */
  async deleteBatch(channel: ChannelRef, batch: readonly ChannelMessage[], outcome: DeletionOutcome = emptyOutcome()): Promise<DeletionOutcome> {
    if (batch.length > BULK_DELETE_MAX_MESSAGES) {
      for (let i = 0; i < batch.length; i += BULK_DELETE_MAX_MESSAGES) {
        await this.deleteBatch(channel, batch.slice(i, i + BULK_DELETE_MAX_MESSAGES), outcome);
      }
      return outcome;
    }
    if (batch.length === 0) return outcome;

    await this.pace();
    outcome.bulkCalls += 1;
    try {
      await this.platform.bulkDelete(
        channel,
        batch.map((message) => message.id)
      );
      outcome.deleted += batch.length;
      retentionMetrics.recordDeleted('bulk', batch.length);
      return outcome;
    } catch (error) {
      if (error instanceof MessageNotFoundError && batch.length === 1) {
        this.recordAlreadyGone(channel, batch[0], outcome);
        return outcome;
      }
      retentionMetrics.recordDeleteFailure('bulk');
      retentionMetrics.recordBulkFallback();
      logger.warn(
        error instanceof BulkDeleteRejectedError
          ? 'retention.delete.bulk_rejected'
          : 'retention.delete.bulk_failed',
        {
          channelId: channel.id,
          channelName: channel.name,
          count: batch.length,
          error: errorMessage(error),
        }
      );
    }

    for (const message of batch) {
      await this.deleteOne(channel, message, outcome);
    }
    return outcome;
  }

  private async deleteOne(channel: ChannelRef, message: ChannelMessage, outcome: DeletionOutcome): Promise<void> {
    await this.pace();
    outcome.singleCalls += 1;
    try {
      await this.platform.deleteMessage(channel, message.id);
      outcome.deleted += 1;
      retentionMetrics.recordDeleted('single', 1);
    } catch (error) {
      if (error instanceof MessageNotFoundError) {
        this.recordAlreadyGone(channel, message, outcome);
        return;
      }
      // Left for the next cycle; retrying now would only add rate-limit pressure.
      outcome.failed += 1;
      retentionMetrics.recordDeleteFailure('single');
      logger.error('retention.delete.single_failed', {
        channelId: channel.id,
        channelName: channel.name,
        messageId: message.id,
        error: errorMessage(error),
      });
    }
  }

  private recordAlreadyGone(channel: ChannelRef, message: ChannelMessage, outcome: DeletionOutcome): void {
    outcome.alreadyGone += 1;
    retentionMetrics.recordAlreadyGone();
    logger.info('retention.delete.already_gone', {
      channelId: channel.id,
      channelName: channel.name,
      messageId: message.id,
    });
  }

  private pace(): Promise<void> {
    return this.sleep(this.rateLimit.currentDelayMs);
  }
}
