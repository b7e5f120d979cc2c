import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { PolicyStorePort } from '../services/ports/policy-store.port';
import type { ChannelId, ChannelPolicy } from '../types/retention.types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export const DEFAULT_BULK_DELETE_MIN = 100;
export const DEFAULT_SCAN_INTERVAL_MINUTES = 2;

const snowflake = z.string().regex(/^\d{1,20}$/, 'channel IDs must be numeric strings');

const channelSettingsSchema = z.object({
  time_threshold: z.number().int().nonnegative().nullable().optional(),
  max_messages: z.number().int().nonnegative().nullable().optional(),
});

// JSON numbers above 2^53 have already been rounded by the parser, so only safe integers are exact.
const legacyId = z.union([
  snowflake,
  z
    .number()
    .int()
    .nonnegative()
    .refine(Number.isSafeInteger, (id) => ({
      message: `channel ID ${id} is too large for a JSON number and may have been rounded; quote it as a string`,
    }))
    .transform(String),
]);

// Older files kept channels as a list of { id, ...settings }
const legacyChannelEntrySchema = channelSettingsSchema.extend({ id: legacyId });

export const policyFileSchema = z
  .object({
    bulk_delete_min: z.number().int().min(1).default(DEFAULT_BULK_DELETE_MIN),
    scan_interval: z.number().int().min(1).default(DEFAULT_SCAN_INTERVAL_MINUTES),
    channels: z
      .union([z.record(snowflake, channelSettingsSchema), z.array(legacyChannelEntrySchema)])
      .default({}),
  })
  .passthrough();

type ChannelSettings = z.infer<typeof channelSettingsSchema>;

interface PolicyFileState {
  bulkDeleteMin: number;
  scanInterval: number;
  channels: Map<ChannelId, ChannelPolicy>;
  /** Keys this store does not manage, written back untouched. */
  extra: Record<string, unknown>;
}

function toPolicy(settings: ChannelSettings): ChannelPolicy {
  const policy: ChannelPolicy = {};
  if (settings.time_threshold != null) policy.timeThresholdMinutes = settings.time_threshold;
  if (settings.max_messages != null) policy.maxMessages = settings.max_messages;
  return policy;
}

function toSettings(policy: ChannelPolicy): ChannelSettings {
  const settings: ChannelSettings = {};
  if (policy.timeThresholdMinutes !== undefined) settings.time_threshold = policy.timeThresholdMinutes;
  if (policy.maxMessages !== undefined) settings.max_messages = policy.maxMessages;
  return settings;
}

export function parsePolicyFile(raw: unknown): PolicyFileState {
  const parsed = policyFileSchema.safeParse(raw);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid retention policy file: ${summary}`, parsed.error.issues);
  }
  const { bulk_delete_min, scan_interval, channels, ...extra } = parsed.data;

  const map = new Map<ChannelId, ChannelPolicy>();
  if (Array.isArray(channels)) {
    for (const { id, ...settings } of channels) map.set(id, toPolicy(settings));
  } else {
    for (const [id, settings] of Object.entries(channels)) map.set(id, toPolicy(settings));
  }

  return { bulkDeleteMin: bulk_delete_min, scanInterval: scan_interval, channels: map, extra };
}

export function serializePolicyFile(state: PolicyFileState): Record<string, unknown> {
  const channels: Record<string, ChannelSettings> = {};
  for (const [id, policy] of state.channels) channels[id] = toSettings(policy);
  return {
    ...state.extra,
    bulk_delete_min: state.bulkDeleteMin,
    scan_interval: state.scanInterval,
    channels,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Policy store backed by a JSON file. The file is read once and every change is
 * written through; writes are serialized so concurrent admin edits cannot interleave.
 */
export class JsonPolicyStore implements PolicyStorePort {
  private state: PolicyFileState | null = null;
  private loading: Promise<PolicyFileState> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async getChannels(): Promise<ChannelId[]> {
    const state = await this.load();
    return [...state.channels.keys()];
  }

  async getChannelPolicy(channelId: ChannelId): Promise<ChannelPolicy | null> {
    const state = await this.load();
    const policy = state.channels.get(channelId);
    return policy ? { ...policy } : null;
  }

  async setChannelPolicy(channelId: ChannelId, policy: ChannelPolicy): Promise<void> {
    const state = await this.load();
    state.channels.set(channelId, { ...policy });
    await this.save();
  }

  async clearChannel(channelId: ChannelId): Promise<void> {
    const state = await this.load();
    if (state.channels.delete(channelId)) {
      await this.save();
    }
  }

  async getBulkDeleteMin(): Promise<number> {
    return (await this.load()).bulkDeleteMin;
  }

  async setBulkDeleteMin(bulkDeleteMin: number): Promise<void> {
    (await this.load()).bulkDeleteMin = bulkDeleteMin;
    await this.save();
  }

  async getScanInterval(): Promise<number> {
    return (await this.load()).scanInterval;
  }

  async setScanInterval(minutes: number): Promise<void> {
    (await this.load()).scanInterval = minutes;
    await this.save();
  }

  private load(): Promise<PolicyFileState> {
    if (this.state) return Promise.resolve(this.state);
    if (!this.loading) {
      this.loading = this.readFile().then(
        (state) => {
          this.state = state;
          return state;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async readFile(): Promise<PolicyFileState> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      logger.warn('retention.policy_store.created', { filePath: this.filePath });
      const state = parsePolicyFile({});
      await this.writeFile(state);
      return state;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`Retention policy file ${this.filePath} is not valid JSON`, [error]);
    }
    const state = parsePolicyFile(raw);
    logger.info('retention.policy_store.loaded', { filePath: this.filePath, channels: state.channels.size });
    return state;
  }

  private save(): Promise<void> {
    const { state } = this;
    if (!state) return Promise.resolve();
    const next = this.writes.then(() => this.writeFile(state));
    // A failed write must not poison the ones queued after it.
    this.writes = next.catch((error: unknown) => {
      logger.error('retention.policy_store.write_failed', { filePath: this.filePath, error });
    });
    return next;
  }

  private async writeFile(state: PolicyFileState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(serializePolicyFile(state), null, 4)}\n`, 'utf8');
  }
}
