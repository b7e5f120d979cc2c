import { RESTEvents } from '@discordjs/rest';
import type { APIRequest, ResponseLike } from '@discordjs/rest';
import { Events, RESTJSONErrorCodes, Routes, SnowflakeUtil } from 'discord.js';
import type { Channel, Client, Collection, GuildTextBasedChannel, Message, Snowflake } from 'discord.js';
import type { ChatPlatformPort } from '../services/ports/chat-platform.port';
import { BULK_DELETE_MAX_MESSAGES } from '../services/ports/chat-platform.port';
import type { PolicyStorePort } from '../services/ports/policy-store.port';
import type { RateLimitTracker } from '../services/rate-limit-tracker.service';
import type { ChannelId, ChannelMessage, ChannelRef, HistoryQuery, MessageId } from '../types/retention.types';
import {
  BulkDeleteRejectedError,
  DeleteRequestFailedError,
  MessageNotFoundError,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';

const PAGE_SIZE = 100;

type DeleteMode = 'single' | 'bulk';

interface ApiErrorShape {
  status: number;
  code?: number | string;
}

function isApiError(error: unknown): error is Error & ApiErrorShape {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

/**
 * Maps errors thrown by the REST client onto the engine's error taxonomy.
 * DiscordAPIError and HTTPError both carry the HTTP status.
 */
export function classifyDeleteError(error: unknown, mode: DeleteMode): Error {
  if (!isApiError(error)) {
    return new DeleteRequestFailedError(errorMessage(error), undefined, error);
  }
  if (error.code === RESTJSONErrorCodes.UnknownMessage || error.status === 404) {
    return new MessageNotFoundError(error.message, error);
  }
  if (mode === 'bulk' && error.status === 400) {
    return new BulkDeleteRejectedError(error.message, error);
  }
  return new DeleteRequestFailedError(error.message, error.status, error);
}

/** DELETE on a message, or the bulk-delete POST: the calls that share the delete bucket. */
export function isDeleteRequest(request: Pick<APIRequest, 'method' | 'path'>): boolean {
  const path = String(request.path);
  if (path.endsWith('/messages/bulk-delete')) return true;
  return request.method.toUpperCase() === 'DELETE' && /\/channels\/\d+\/messages\/\d+$/.test(path);
}

function toChannelMessage(message: Message): ChannelMessage {
  return {
    id: message.id,
    channelId: message.channelId,
    createdAt: message.createdAt,
    pinned: message.pinned,
  };
}

function sortedPage<M extends Message>(page: Collection<Snowflake, M>, oldestFirst: boolean): M[] {
  const sign = oldestFirst ? 1 : -1;
  return [...page.values()].sort((a, b) => sign * (a.createdTimestamp - b.createdTimestamp));
}

export class DiscordChatPlatform implements ChatPlatformPort {
  constructor(
    private readonly client: Client,
    private readonly rateLimit: RateLimitTracker
  ) {
    this.client.rest.on(RESTEvents.Response, (request: APIRequest, response: ResponseLike) => {
      if (isDeleteRequest(request)) this.rateLimit.observe(response.headers);
    });
  }

  async resolveChannel(channelId: ChannelId): Promise<ChannelRef | null> {
    const channel = await this.fetchTextChannel(channelId);
    return channel ? { id: channel.id, name: channel.name } : null;
  }

  async *fetchHistory(channel: ChannelRef, query: HistoryQuery): AsyncIterable<ChannelMessage> {
    const text = await this.fetchTextChannel(channel.id);
    if (!text) return;
    if (query.oldestFirst) {
      yield* this.pageForward(text, query.before);
    } else {
      yield* this.pageBackward(text, query.before);
    }
  }

  async deleteMessage(channel: ChannelRef, messageId: MessageId): Promise<void> {
    try {
      await this.client.rest.delete(Routes.channelMessage(channel.id, messageId));
    } catch (error) {
      throw classifyDeleteError(error, 'single');
    }
  }

  async bulkDelete(channel: ChannelRef, messageIds: readonly MessageId[]): Promise<void> {
    if (messageIds.length > BULK_DELETE_MAX_MESSAGES) {
      throw new BulkDeleteRejectedError(`Bulk delete accepts at most ${BULK_DELETE_MAX_MESSAGES} messages, got ${messageIds.length}`);
    }
    if (new Set(messageIds).size !== messageIds.length) {
      throw new BulkDeleteRejectedError('Bulk delete received duplicate message IDs');
    }
    if (messageIds.length === 0) return;
    // The endpoint wants at least two IDs; a lone message goes through the single route.
    if (messageIds.length === 1) {
      try {
        await this.client.rest.delete(Routes.channelMessage(channel.id, messageIds[0]));
      } catch (error) {
        throw classifyDeleteError(error, 'bulk');
      }
      return;
    }
    try {
      await this.client.rest.post(Routes.channelBulkDelete(channel.id), { body: { messages: [...messageIds] } });
    } catch (error) {
      throw classifyDeleteError(error, 'bulk');
    }
  }

  async sendNotice(channel: ChannelRef, text: string): Promise<void> {
    await this.client.rest.post(Routes.channelMessages(channel.id), {
      body: { content: text, allowed_mentions: { parse: [] } },
    });
  }

  /** Logs gateway delete events for managed channels, including the engine's own deletions. */
  logDeletionEvents(store: PolicyStorePort): void {
    const logIfManaged = async (channelId: ChannelId, count: number) => {
      if (await store.getChannelPolicy(channelId)) {
        logger.info('retention.platform.message_deleted', { channelId, count });
      }
    };
    const report = (error: unknown) => logger.warn('retention.platform.event_failed', { error: errorMessage(error) });

    this.client.on(Events.MessageDelete, (message) => {
      logIfManaged(message.channelId, 1).catch(report);
    });
    this.client.on(Events.MessageBulkDelete, (messages, channel) => {
      logIfManaged(channel.id, messages.size).catch(report);
    });
  }

  private async fetchTextChannel(channelId: ChannelId): Promise<GuildTextBasedChannel | null> {
    let channel: Channel | null | undefined;
    try {
      channel = this.client.channels.cache.get(channelId) ?? (await this.client.channels.fetch(channelId));
    } catch (error) {
      if (isApiError(error) && (error.code === RESTJSONErrorCodes.UnknownChannel || error.status === 404)) {
        return null;
      }
      throw error;
    }
    if (!channel) return null;
    if (!channel.isTextBased() || channel.isDMBased()) {
      throw new Error(`Channel ${channelId} is not a server text channel`);
    }
    return channel;
  }

  private async *pageForward(channel: GuildTextBasedChannel, before?: Date): AsyncGenerator<ChannelMessage> {
    let after: Snowflake = '0';
    for (;;) {
      const page = await channel.messages.fetch({ limit: PAGE_SIZE, after, cache: false });
      if (page.size === 0) return;
      for (const message of sortedPage(page, true)) {
        if (before && message.createdTimestamp >= before.getTime()) return;
        yield toChannelMessage(message);
        after = message.id;
      }
      if (page.size < PAGE_SIZE) return;
    }
  }

  private async *pageBackward(channel: GuildTextBasedChannel, before?: Date): AsyncGenerator<ChannelMessage> {
    let cursor: Snowflake | undefined = before ? SnowflakeUtil.generate({ timestamp: before.getTime() }).toString() : undefined;
    for (;;) {
      const page = await channel.messages.fetch({ limit: PAGE_SIZE, cache: false, ...(cursor ? { before: cursor } : {}) });
      if (page.size === 0) return;
      for (const message of sortedPage(page, false)) {
        yield toChannelMessage(message);
        cursor = message.id;
      }
      if (page.size < PAGE_SIZE) return;
    }
  }
}
