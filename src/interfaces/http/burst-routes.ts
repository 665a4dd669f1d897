import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * Synthetic traffic route.
 *
 * POST /api/v1/burst — fire a fixed-size burst of log records at the
 * backend's ingest endpoint. Answers 202 before any record is delivered;
 * per-record failures are never reported.
 */
async function burstRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/burst',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const receipt = fastify.dashboard.burst();

      return reply.status(202).send({
        status: 'sent',
        attempted: receipt.attempted,
      });
    },
  );
}

export default fp(burstRoutes, {
  name: 'burst-routes',
  dependencies: ['dashboard'],
  fastify: '5.x',
});
