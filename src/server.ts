// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'test') {
  dotenv.config({ path: '.env.test' });
} else {
  dotenv.config();
}

import { createServer } from 'http';
import type { Socket } from 'net';
import { Events } from 'discord.js';
import { createApp } from './app';
import { createDiscordCompositionRoot } from './app/composition-root';
import { loadRetentionConfig } from './config/retention.config';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

async function startServer() {
  const config = loadRetentionConfig();
  const root = createDiscordCompositionRoot(config);
  const { client, worker } = root;

  // Fail early on an unreadable policy file instead of on the first scan
  const channels = await root.store.getChannels();
  logger.info('retention.startup', { channels: channels.length, policyFile: config.policyFile });

  const httpServer = createServer(createApp(root));
  // Track open sockets so we can force-close on shutdown to avoid hangs
  const sockets = new Set<Socket>();
  httpServer.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  httpServer.listen(config.port, () => {
    logger.info('retention.http.listening', { port: config.port, adminApi: Boolean(config.adminApiToken) });
  });

  // `ready` fires again after failed RESUMEs; the worker ignores repeated starts.
  client.on(Events.ClientReady, (readyClient) => {
    logger.info('retention.discord.ready', { user: readyClient.user.tag, id: readyClient.user.id });
    worker.start().catch((error: unknown) => {
      logger.error('retention.worker.crashed', { error: errorMessage(error) });
    });
  });
  client.on(Events.Error, (error) => {
    logger.error('retention.discord.error', { error: errorMessage(error) });
  });

  await client.login(config.discordToken);

  let shuttingDown = false;
  const graceful = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('retention.shutdown', { signal });
    worker.stop();
    await client.destroy();
    sockets.forEach((s) => s.destroy());
    httpServer.close(() => {
      logger.info('retention.shutdown.complete');
      process.exit(0);
    });
    // Fallback hard-exit if close hangs
    setTimeout(() => process.exit(0), 5000).unref();
  };

  const onSignal = (signal: string) => {
    graceful(signal).catch((error: unknown) => {
      logger.error('retention.shutdown.failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.error('retention.startup.failed', { error: errorMessage(error) });
  process.exit(1);
});
