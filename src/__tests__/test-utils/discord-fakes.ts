import { CategoryChannel, ChannelType, Client, Collection, TextChannel } from 'discord.js';
import type { RESTOptions, ResponseLike } from '@discordjs/rest';

export interface RecordedRequest {
  method: string;
  path: string;
  body?: unknown;
}

export type Responder = (request: RecordedRequest) => ResponseLike;

const API_PREFIX = /^https?:\/\/[^/]+\/api\/v\d+/;

export function restResponse(status: number, body?: unknown, headers: Record<string, string> = {}): ResponseLike {
  if (body === undefined) return new Response(null, { status, headers });
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export const noContent = (headers: Record<string, string> = {}): ResponseLike => restResponse(204, undefined, headers);

/**
 * A real discord.js client whose REST transport answers from `respond` instead of the
 * network. Every request is recorded with its API path and parsed JSON body.
 */
export function createTestClient(respond: Responder = () => noContent()) {
  const requests: RecordedRequest[] = [];
  const makeRequest: RESTOptions['makeRequest'] = async (url, init) => {
    const request: RecordedRequest = {
      method: init.method ?? 'GET',
      path: url.replace(API_PREFIX, '').split('?')[0],
      body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);
    return respond(request);
  };
  const client = new Client({ intents: [], rest: { makeRequest, retries: 0 } });
  client.rest.setToken('test-token');
  return { client, requests };
}

export interface FakeMessage {
  id: string;
  channelId: string;
  createdTimestamp: number;
  createdAt: Date;
  pinned: boolean;
}

export interface MessagePageRequest {
  limit: number;
  after?: string;
  before?: string;
  cache?: boolean;
}

export function fakeMessages(count: number, options: { channelId: string; firstId: number; start: Date }): FakeMessage[] {
  return Array.from({ length: count }, (_, i) => {
    const createdTimestamp = options.start.getTime() + i * 60_000;
    return {
      id: String(options.firstId + i),
      channelId: options.channelId,
      createdTimestamp,
      createdAt: new Date(createdTimestamp),
      pinned: false,
    };
  });
}

/**
 * Serves `messages` the way the history endpoint does: at most `limit` per page, newest
 * first, either after or before a message ID.
 */
function pageServer(messages: readonly FakeMessage[]) {
  const ordered = [...messages].sort((a, b) => (BigInt(a.id) < BigInt(b.id) ? -1 : 1));
  return jest.fn(async (options: MessagePageRequest) => {
    const { after, before, limit } = options;
    let selected: FakeMessage[];
    if (after !== undefined) {
      selected = ordered.filter((m) => BigInt(m.id) > BigInt(after)).slice(0, limit);
    } else {
      const older = before === undefined ? ordered : ordered.filter((m) => BigInt(m.id) < BigInt(before));
      selected = older.slice(Math.max(0, older.length - limit));
    }
    return new Collection(selected.reverse().map((m) => [m.id, m]));
  });
}

// discord.js keeps channel constructors internal, so the fakes borrow the real prototypes
// and the type guards (`isTextBased`, `isDMBased`) run the library's own code.

export function fakeTextChannel(id: string, name: string, messages: readonly FakeMessage[] = []) {
  const fetch = pageServer(messages);
  const channel: TextChannel = Object.assign(Object.create(TextChannel.prototype), {
    id,
    name,
    type: ChannelType.GuildText,
    guildId: '1',
    messages: { fetch },
  });
  return { channel, fetch };
}

export function fakeCategoryChannel(id: string, name: string): CategoryChannel {
  return Object.assign(Object.create(CategoryChannel.prototype), {
    id,
    name,
    type: ChannelType.GuildCategory,
    guildId: '1',
  });
}
