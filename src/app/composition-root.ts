import { Client, GatewayIntentBits, Partials } from 'discord.js';
import type { RetentionConfig } from '../config/retention.config';
import type { PolicyStorePort } from '../services/ports/policy-store.port';
import type { ChatPlatformPort } from '../services/ports/chat-platform.port';
import { RateLimitTracker } from '../services/rate-limit-tracker.service';
import { DeletionBatchingEngine } from '../services/deletion-batching.service';
import type { Sleep } from '../services/deletion-batching.service';
import { RetentionScanWorker } from '../workers/retention-scan.worker';
import { JsonPolicyStore } from '../adapters/policy-store.json';
import { DiscordChatPlatform } from '../adapters/chat-platform.discord';

export interface CompositionRoot {
  store: PolicyStorePort;
  platform: ChatPlatformPort;
  rateLimit: RateLimitTracker;
  deleter: DeletionBatchingEngine;
  worker: RetentionScanWorker;
  adminApiToken?: string;
}

export interface CompositionOverrides {
  store: PolicyStorePort;
  platform: ChatPlatformPort;
  rateLimit?: RateLimitTracker;
  adminApiToken?: string;
  sleep?: Sleep;
  now?: () => Date;
}

/** Wires the engine around whichever store and platform it is given. */
export function buildCompositionRoot(overrides: CompositionOverrides): CompositionRoot {
  const { store, platform, adminApiToken, sleep, now } = overrides;
  const rateLimit = overrides.rateLimit ?? new RateLimitTracker();
  const deleter = new DeletionBatchingEngine({ platform, rateLimit, sleep, now });
  const worker = new RetentionScanWorker({ store, platform, rateLimit, deleter, sleep, now });
  return { store, platform, rateLimit, deleter, worker, adminApiToken };
}

export interface DiscordCompositionRoot extends CompositionRoot {
  client: Client;
}

export function createDiscordCompositionRoot(config: RetentionConfig): DiscordCompositionRoot {
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages],
    // Delete events for messages sent before the bot connected arrive as partials
    partials: [Partials.Message],
  });
  const rateLimit = new RateLimitTracker();
  const store = new JsonPolicyStore(config.policyFile);
  const platform = new DiscordChatPlatform(client, rateLimit);
  platform.logDeletionEvents(store);
  const root = buildCompositionRoot({ store, platform, rateLimit, adminApiToken: config.adminApiToken });
  return { ...root, client };
}
