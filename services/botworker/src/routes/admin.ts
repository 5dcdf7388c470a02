import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { flushBotChannels } from '../client/admin';
import type { MessageChannel } from '../contracts/channel';

const flushSchema = z.object({
  char_range: z.string().min(1).max(256).optional(),
});

export async function registerAdminRoutes(app: FastifyInstance, channel: MessageChannel) {
  // Sweep pending requests off the input channels (environment reset between runs)
  app.post('/bots.flush', async (req, reply) => {
    const parsed = flushSchema.safeParse(req.body ?? {});
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    try {
      const deleted = await flushBotChannels(channel, { charRange: parsed.data.char_range });
      return reply.send({ deleted });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      req.log.error({ err }, 'Flushing bot channels failed');
      return reply.code(500).send({ error: 'flush_failed', detail: message });
    }
  });
}
