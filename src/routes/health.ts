import { FastifyInstance } from 'fastify';

export async function healthRoutes(app: FastifyInstance): Promise<void> {
  app.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'Health check (inclui o banco)',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
          },
        },
      },
    },
  }, async () => {
    // Falha com 500 se o banco não responder
    app.ctx.db.prepare('SELECT 1').get();
    return { status: 'ok' };
  });
}
