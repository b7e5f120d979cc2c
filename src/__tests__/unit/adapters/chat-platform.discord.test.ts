import type { Client } from 'discord.js';
import { DiscordChatPlatform, classifyDeleteError, isDeleteRequest } from '../../../adapters/chat-platform.discord';
import { RateLimitTracker } from '../../../services/rate-limit-tracker.service';
import type { ChannelMessage } from '../../../types/retention.types';
import {
  createTestClient,
  fakeCategoryChannel,
  fakeMessages,
  fakeTextChannel,
  noContent,
  restResponse,
} from '../../test-utils/discord-fakes';
import type { RecordedRequest, Responder } from '../../test-utils/discord-fakes';
import { BulkDeleteRejectedError, DeleteRequestFailedError, MessageNotFoundError } from '../../../utils/errors';

function apiError(message: string, status: number, code?: number): Error {
  return Object.assign(new Error(message), { status, code });
}

describe('classifyDeleteError', () => {
  it('maps unknown-message responses to MessageNotFoundError', () => {
    const original = apiError('Unknown Message', 404, 10008);

    const error = classifyDeleteError(original, 'single');

    expect(error).toBeInstanceOf(MessageNotFoundError);
    expect(error).toMatchObject({ message: 'Unknown Message', originalError: original });
  });

  it('treats any 404 as the message being gone', () => {
    expect(classifyDeleteError(apiError('Not Found', 404), 'bulk')).toBeInstanceOf(MessageNotFoundError);
  });

  it('maps a refused bulk call to BulkDeleteRejectedError', () => {
    expect(classifyDeleteError(apiError('Invalid Form Body', 400, 50034), 'bulk')).toBeInstanceOf(BulkDeleteRejectedError);
  });

  it('keeps the status of every other failure', () => {
    const badRequest = classifyDeleteError(apiError('Invalid Form Body', 400), 'single');
    const forbidden = classifyDeleteError(apiError('Missing Permissions', 403, 50013), 'bulk');

    expect(badRequest).toBeInstanceOf(DeleteRequestFailedError);
    expect(badRequest).toMatchObject({ status: 400 });
    expect(forbidden).toBeInstanceOf(DeleteRequestFailedError);
    expect(forbidden).toMatchObject({ status: 403, message: 'Missing Permissions' });
  });

  it('wraps errors that carry no HTTP status', () => {
    const error = classifyDeleteError(new Error('socket hang up'), 'single');

    expect(error).toBeInstanceOf(DeleteRequestFailedError);
    expect(error).toMatchObject({ message: 'socket hang up', status: undefined });
    expect(classifyDeleteError('boom', 'single').message).toBe('boom');
  });
});

describe('isDeleteRequest', () => {
  it('matches single and bulk message deletes', () => {
    expect(isDeleteRequest({ method: 'DELETE', path: '/channels/1/messages/2' })).toBe(true);
    expect(isDeleteRequest({ method: 'POST', path: '/channels/1/messages/bulk-delete' })).toBe(true);
  });

  it('ignores other requests', () => {
    expect(isDeleteRequest({ method: 'GET', path: '/channels/1/messages/2' })).toBe(false);
    expect(isDeleteRequest({ method: 'GET', path: '/channels/1/messages' })).toBe(false);
    expect(isDeleteRequest({ method: 'DELETE', path: '/channels/1' })).toBe(false);
  });
});

describe('DiscordChatPlatform', () => {
  const channel = { id: '1', name: 'general' };
  const start = new Date('2026-03-01T00:00:00Z');
  const clients: Client[] = [];
  let client: Client;
  let requests: RecordedRequest[];
  let tracker: RateLimitTracker;
  let platform: DiscordChatPlatform;

  const setUp = (respond?: Responder) => {
    ({ client, requests } = createTestClient(respond));
    clients.push(client);
    tracker = new RateLimitTracker();
    platform = new DiscordChatPlatform(client, tracker);
  };

  const collect = async (history: AsyncIterable<ChannelMessage>): Promise<ChannelMessage[]> => {
    const out: ChannelMessage[] = [];
    for await (const message of history) out.push(message);
    return out;
  };

  beforeEach(() => setUp());

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((c) => c.destroy()));
  });

  describe('rate-limit headers', () => {
    const exhausted = { 'x-ratelimit-remaining': '0', 'x-ratelimit-limit': '5', 'x-ratelimit-reset-after': '0.01' };

    it('feeds delete responses to the tracker', async () => {
      setUp(() => noContent(exhausted));

      await platform.deleteMessage(channel, '2');

      expect(requests).toEqual([{ method: 'DELETE', path: '/channels/1/messages/2', body: undefined }]);
      expect(tracker.currentDelaySeconds).toBeCloseTo(0.002);
    });

    it('ignores the headers of other calls', async () => {
      setUp(() => restResponse(200, { id: '5' }, exhausted));

      await platform.sendNotice(channel, 'hello');

      expect(tracker.currentDelaySeconds).toBe(0);
    });
  });

  describe('deleteMessage', () => {
    it('maps an unknown message to MessageNotFoundError', async () => {
      setUp(() => restResponse(404, { code: 10008, message: 'Unknown Message' }));

      await expect(platform.deleteMessage(channel, '2')).rejects.toBeInstanceOf(MessageNotFoundError);
    });

    it('keeps the status of a refused delete', async () => {
      setUp(() => restResponse(403, { code: 50013, message: 'Missing Permissions' }));

      await expect(platform.deleteMessage(channel, '2')).rejects.toMatchObject({
        name: 'DeleteRequestFailedError',
        status: 403,
      });
    });
  });

  describe('bulkDelete', () => {
    it('posts the IDs to the bulk route', async () => {
      await platform.bulkDelete(channel, ['2', '3']);

      expect(requests).toEqual([
        { method: 'POST', path: '/channels/1/messages/bulk-delete', body: { messages: ['2', '3'] } },
      ]);
    });

    it('sends a lone ID through the single-delete route', async () => {
      await platform.bulkDelete(channel, ['2']);

      expect(requests).toEqual([{ method: 'DELETE', path: '/channels/1/messages/2', body: undefined }]);
    });

    it('reports a vanished lone message as not found', async () => {
      setUp(() => restResponse(404, { code: 10008, message: 'Unknown Message' }));

      await expect(platform.bulkDelete(channel, ['2'])).rejects.toBeInstanceOf(MessageNotFoundError);
    });

    it('maps a refused bulk call to BulkDeleteRejectedError', async () => {
      setUp(() => restResponse(400, { code: 50034, message: 'Invalid Form Body' }));

      await expect(platform.bulkDelete(channel, ['2', '3'])).rejects.toBeInstanceOf(BulkDeleteRejectedError);
    });

    it('refuses more than 100 IDs without calling the API', async () => {
      const ids = Array.from({ length: 101 }, (_, i) => String(1000 + i));

      await expect(platform.bulkDelete(channel, ids)).rejects.toThrow(
        'Bulk delete accepts at most 100 messages, got 101'
      );
      expect(requests).toEqual([]);
    });

    it('refuses duplicate IDs without calling the API', async () => {
      await expect(platform.bulkDelete(channel, ['2', '2'])).rejects.toBeInstanceOf(BulkDeleteRejectedError);
      expect(requests).toEqual([]);
    });

    it('does nothing for an empty list', async () => {
      await platform.bulkDelete(channel, []);

      expect(requests).toEqual([]);
    });
  });

  describe('sendNotice', () => {
    it('posts the text without pinging anyone', async () => {
      setUp(() => restResponse(200, { id: '5' }));

      await platform.sendNotice(channel, 'Auto-delete settings changed');

      expect(requests).toEqual([
        {
          method: 'POST',
          path: '/channels/1/messages',
          body: { content: 'Auto-delete settings changed', allowed_mentions: { parse: [] } },
        },
      ]);
    });
  });

  describe('resolveChannel', () => {
    it('returns a cached text channel', async () => {
      client.channels.cache.set('1', fakeTextChannel('1', 'general').channel);

      await expect(platform.resolveChannel('1')).resolves.toEqual({ id: '1', name: 'general' });
      expect(requests).toEqual([]);
    });

    it('returns null for an unknown channel', async () => {
      setUp(() => restResponse(404, { code: 10003, message: 'Unknown Channel' }));

      await expect(platform.resolveChannel('9')).resolves.toBeNull();
      expect(requests).toEqual([{ method: 'GET', path: '/channels/9', body: undefined }]);
    });

    it('passes on lookup failures other than not-found', async () => {
      setUp(() => restResponse(403, { code: 50001, message: 'Missing Access' }));

      await expect(platform.resolveChannel('9')).rejects.toMatchObject({ status: 403 });
    });

    it('rejects channels without message history', async () => {
      client.channels.cache.set('7', fakeCategoryChannel('7', 'archive'));

      await expect(platform.resolveChannel('7')).rejects.toThrow('Channel 7 is not a server text channel');
    });
  });

  describe('fetchHistory', () => {
    const messages = fakeMessages(250, { channelId: '1', firstId: 1000, start });

    it('pages oldest first by message ID', async () => {
      const { channel: text, fetch } = fakeTextChannel('1', 'general', messages);
      client.channels.cache.set('1', text);

      const history = await collect(platform.fetchHistory(channel, { oldestFirst: true }));

      expect(history.map((m) => m.id)).toEqual(messages.map((m) => m.id));
      expect(history[0]).toEqual({ id: '1000', channelId: '1', createdAt: start, pinned: false });
      expect(fetch.mock.calls.map(([options]) => options.after)).toEqual(['0', '1099', '1199']);
    });

    it('stops paging forward at the cutoff', async () => {
      const { channel: text, fetch } = fakeTextChannel('1', 'general', messages);
      client.channels.cache.set('1', text);

      const history = await collect(
        platform.fetchHistory(channel, { oldestFirst: true, before: messages[150].createdAt })
      );

      expect(history).toHaveLength(150);
      expect(history[history.length - 1].id).toBe('1149');
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('pages newest first by message ID', async () => {
      const { channel: text, fetch } = fakeTextChannel('1', 'general', messages);
      client.channels.cache.set('1', text);

      const history = await collect(platform.fetchHistory(channel, { oldestFirst: false }));

      expect(history.map((m) => m.id)).toEqual(messages.map((m) => m.id).reverse());
      expect(fetch.mock.calls.map(([options]) => options.before)).toEqual([undefined, '1150', '1050']);
    });

    it('yields nothing for an unknown channel', async () => {
      setUp(() => restResponse(404, { code: 10003, message: 'Unknown Channel' }));

      await expect(collect(platform.fetchHistory(channel, { oldestFirst: true }))).resolves.toEqual([]);
    });
  });
});
