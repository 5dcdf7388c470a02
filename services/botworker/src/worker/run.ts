import type { FastifyInstance } from 'fastify';
import { config } from '../config';
import type { BotLogic, ParticipantStore } from '../contracts/collaborators';
import { logger } from '../logger';
import { createRedisChannel, RedisMessageChannel } from '../redis/channel';
import { closeRedis, getRedis } from '../redis/client';
import { buildApp } from '../server';
import { CommandDispatcher } from './dispatcher';
import { ChannelListener } from './listener';

export interface BotWorkerOptions {
  participants: ParticipantStore;
  botLogic: BotLogic;
  charRange?: string;
  /** Serve /health and /bots.flush on config.host:config.port. */
  http?: boolean;
}

export interface BotWorkerHandle {
  dispatcher: CommandDispatcher;
  listener: ChannelListener;
  app: FastifyInstance | null;
  /** Settles when the receive loop ends. */
  done: Promise<void>;
  stop(): Promise<void>;
}

/**
 * Starts a bot worker process: dispatcher, receive loop on its own Redis
 * connection, and optionally the health server. The returned handle is what
 * the host passes around; there is no process-wide worker instance.
 */
export async function startBotWorker(options: BotWorkerOptions): Promise<BotWorkerHandle> {
  const dispatcher = new CommandDispatcher({
    participants: options.participants,
    botLogic: options.botLogic,
  });

  let app: FastifyInstance | null = null;
  if (options.http) {
    app = await buildApp({ channel: new RedisMessageChannel(getRedis()), dispatcher, logger: true });
    try {
      await app.listen({ port: config.port, host: config.host });
    } catch (err) {
      await app.close();
      await closeRedis();
      throw err;
    }
    app.log.info(`Bot worker health server listening on http://${config.host}:${config.port}`);
  }

  // opened after the HTTP server is up so a failed listen leaves nothing to close
  const listenChannel = createRedisChannel();
  const listener = new ChannelListener({
    channel: listenChannel,
    dispatcher,
    charRange: options.charRange,
  });

  const done = listener.listen();

  const stop = async () => {
    await listener.stop();
    await listenChannel.close();
    if (app) await app.close();
    await closeRedis();
  };

  return { dispatcher, listener, app, done, stop };
}

/** Runs a worker until SIGINT/SIGTERM; exits the process if the loop fails. */
export async function runBotWorker(options: BotWorkerOptions): Promise<void> {
  const worker = await startBotWorker(options);

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down bot worker');
    worker.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Bot worker shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await worker.done;
  } catch (err) {
    logger.fatal({ err }, 'Bot worker receive loop failed');
    process.exit(1);
  }
}
