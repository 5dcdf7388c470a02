import Fastify from 'fastify';
import type { MessageChannel } from './contracts/channel';
import { registerAdminRoutes } from './routes/admin';
import type { CommandDispatcher } from './worker/dispatcher';

export interface BuildAppOptions {
  /** Non-blocking channel for health checks and sweeps (not the listener's). */
  channel: MessageChannel;
  dispatcher: CommandDispatcher;
  logger?: boolean;
}

export async function buildApp({ channel, dispatcher, logger = false }: BuildAppOptions) {
  const app = Fastify({ logger });

  app.get('/health', async () => {
    const bots = dispatcher.stats();
    try {
      await channel.ping();
      return { status: 'ok', redis: 'ok', ...bots };
    } catch (err) {
      app.log.error({ err }, 'Redis health check failed');
      return { status: 'degraded', redis: 'error', ...bots };
    }
  });

  await registerAdminRoutes(app, channel);
  return app;
}
