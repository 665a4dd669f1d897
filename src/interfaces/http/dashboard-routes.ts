import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * Dashboard read-model routes.
 *
 * GET  /api/v1/dashboard          — settled view of the current session
 * POST /api/v1/dashboard/refresh  — run (or join) a refresh cycle, then the view
 */
async function dashboardRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/dashboard',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.dashboard.view());
    },
  );

  /**
   * Manual refresh. A failed fetch is not an HTTP error: the view comes
   * back with `backend.status === 'unreachable'` and the retained data.
   */
  fastify.post(
    '/api/v1/dashboard/refresh',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const view = await fastify.dashboard.refresh();
      return reply.status(200).send(view);
    },
  );
}

export default fp(dashboardRoutes, {
  name: 'dashboard-routes',
  dependencies: ['dashboard'],
  fastify: '5.x',
});
