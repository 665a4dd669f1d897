import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { settingsPatchSchema } from '../../application/settings-schema.js';

/**
 * Session settings routes.
 *
 * GET   /api/v1/settings — sensitivity (k) and live-stream toggle
 * PATCH /api/v1/settings — partial update; toggling liveStream arms or
 *                          disarms auto-refresh
 */
async function settingsRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/settings',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.dashboard.getSettings());
    },
  );

  fastify.patch(
    '/api/v1/settings',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = settingsPatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const settings = fastify.dashboard.updateSettings(parsed.data);
      return reply.status(200).send(settings);
    },
  );
}

export default fp(settingsRoutes, {
  name: 'settings-routes',
  dependencies: ['dashboard'],
  fastify: '5.x',
});
