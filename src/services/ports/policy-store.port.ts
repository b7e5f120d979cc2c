import type { ChannelId, ChannelPolicy } from '../../types/retention.types';

export interface PolicyStorePort {
  getChannels(): Promise<ChannelId[]>;
  /** `null` when the channel has no retention entry. */
  getChannelPolicy(channelId: ChannelId): Promise<ChannelPolicy | null>;
  setChannelPolicy(channelId: ChannelId, policy: ChannelPolicy): Promise<void>;
  /** Idempotent; clearing an unknown channel is a no-op. */
  clearChannel(channelId: ChannelId): Promise<void>;
  getBulkDeleteMin(): Promise<number>;
  setBulkDeleteMin(bulkDeleteMin: number): Promise<void>;
  /** Minutes between scans, as configured (before the two-minute floor). */
  getScanInterval(): Promise<number>;
  setScanInterval(minutes: number): Promise<void>;
}
