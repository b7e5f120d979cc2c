import type { ChannelId, ChannelMessage, ChannelRef, HistoryQuery, MessageId } from '../../types/retention.types';

/** Largest number of IDs one bulk-delete call accepts. */
export const BULK_DELETE_MAX_MESSAGES = 100;
/** Bulk delete only accepts messages younger than this. */
export const BULK_DELETE_MAX_AGE_MS = 14 * 24 * 60 * 60 * 1000;

/**
 * Boundary to the chat platform. Adapters raise MessageNotFoundError,
 * BulkDeleteRejectedError or DeleteRequestFailedError from the delete calls and
 * report rate-limit metadata of every delete-class response to the tracker they were
 * built with.
 */
export interface ChatPlatformPort {
  /** `null` when the channel no longer exists. */
  resolveChannel(channelId: ChannelId): Promise<ChannelRef | null>;
  fetchHistory(channel: ChannelRef, query: HistoryQuery): AsyncIterable<ChannelMessage>;
  deleteMessage(channel: ChannelRef, messageId: MessageId): Promise<void>;
  bulkDelete(channel: ChannelRef, messageIds: readonly MessageId[]): Promise<void>;
  /** Posts a plain text message to the channel's members. */
  sendNotice(channel: ChannelRef, text: string): Promise<void>;
}
