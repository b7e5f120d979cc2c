/**
 * Retention domain types shared by the evaluator, the batching engine and the scan worker.
 */

/** Discord snowflake, carried as a decimal string (64-bit IDs do not fit a JS number). */
export type ChannelId = string;
export type MessageId = string;

/**
 * Per-channel retention settings as stored. Both fields absent means the channel is
 * configured but nothing is deleted from it.
 */
export interface ChannelPolicy {
  /** Messages older than this many minutes are deletable. */
  timeThresholdMinutes?: number;
  /** Only this many of the most recent unpinned messages are kept. */
  maxMessages?: number;
}

export type RetentionRule =
  | { kind: 'none' }
  | { kind: 'age'; timeThresholdMinutes: number }
  | { kind: 'count'; maxMessages: number }
  | { kind: 'age-and-count'; timeThresholdMinutes: number; maxMessages: number };

export interface ChannelMessage {
  id: MessageId;
  channelId: ChannelId;
  createdAt: Date;
  pinned: boolean;
}

/** Messages selected for deletion in one channel, oldest first. */
export type DeletableSet = ChannelMessage[];

/** Resolved handle for a channel; `name` is only used for log lines. */
export interface ChannelRef {
  id: ChannelId;
  name: string;
}

export interface HistoryQuery {
  oldestFirst: boolean;
  /** Only messages created strictly before this instant. */
  before?: Date;
}

export interface DeletionOutcome {
  deleted: number;
  alreadyGone: number;
  failed: number;
  bulkCalls: number;
  singleCalls: number;
}

export type ChannelScanStatus = 'planned' | 'deleted' | 'scan_failed' | 'delete_failed' | 'pruned';

export interface ChannelScanResult {
  channelId: ChannelId;
  channelName?: string;
  status: ChannelScanStatus;
  deletable: number;
  outcome?: DeletionOutcome;
  error?: string;
}

export interface ScanCycleSummary {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  trigger: 'scheduled' | 'manual';
  channels: ChannelScanResult[];
  pruned: ChannelId[];
}

export type WorkerState = 'idle' | 'running';

export function emptyOutcome(): DeletionOutcome {
  return { deleted: 0, alreadyGone: 0, failed: 0, bulkCalls: 0, singleCalls: 0 };
}
