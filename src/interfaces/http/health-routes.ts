import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * GET /api/v1/health — process liveness plus the last known backend state.
 *
 * Always 200 while the process runs: an unreachable backend is a dashboard
 * state, not a failure of this service.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { scheduler } = fastify.dashboard;

      return reply.status(200).send({
        status: 'ok',
        backend: fastify.dashboard.session.state().backend,
        phase: scheduler.phase,
        live: scheduler.running,
        cycles: scheduler.cycles,
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['dashboard'],
  fastify: '5.x',
});
