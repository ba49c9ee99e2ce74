import Fastify, { type FastifyServerOptions } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { timingSafeEqual } from 'crypto';
import { ZodError } from 'zod';
import { healthRoutes } from './routes/health';
import { principalRoutes } from './routes/principals';
import { openDatabase } from './database/DatabaseService';
import { SqliteQueryExecutor } from './database/QueryExecutor';
import { AppError } from './errors/AppError';
import {
  UserLookupService,
  type UserLookupConfig,
  type UserLookupOptions,
} from './services/UserLookupService';
import type { Database } from 'better-sqlite3';

export interface AppContext {
  db: Database;
  lookup: UserLookupService;
}

export interface BuildAppOptions {
  dbPath?: string;  // default: ':memory:' (testes usam este default)
  db?: Database;
  lookup?: Partial<UserLookupConfig>;
  lookupOptions?: UserLookupOptions;
  internalApiToken?: string;
  logger?: FastifyServerOptions['logger'];
}

declare module 'fastify' {
  interface FastifyInstance {
    ctx: AppContext;
  }
}

// Rotas que NÃO exigem o token interno
const PUBLIC_PREFIXES = ['/health', '/docs'];

export const INTERNAL_TOKEN_HEADER = 'x-internal-token';

export function tokenMatches(received: string | string[] | undefined, expected: string): boolean {
  if (typeof received !== 'string') return false;
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  // timingSafeEqual exige buffers do mesmo tamanho
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export function buildApp(opts: BuildAppOptions = {}) {
  const app = Fastify({
    logger: opts.logger ?? false,
    ajv: {
      customOptions: {
        keywords: ['example'],
      },
    },
  });

  const db = opts.db ?? openDatabase(opts.dbPath ?? ':memory:');
  const lookup = new UserLookupService(new SqliteQueryExecutor(db), opts.lookup, opts.lookupOptions);

  app.decorate('ctx', { db, lookup });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Authority Lookup',
        description: 'Resolve usuários e suas authorities a partir do banco.',
        version: '0.1.0',
      },
      tags: [
        { name: 'Health', description: 'Health check' },
        { name: 'Principals', description: 'Lookup de usuários e authorities' },
      ],
    },
  });

  app.register(swaggerUi, {
    routePrefix: '/docs',
  });

  const token = opts.internalApiToken;
  if (token) {
    app.addHook('preHandler', async (request, reply) => {
      const url = request.raw.url ?? '';
      if (PUBLIC_PREFIXES.some(prefix => url.startsWith(prefix))) return;
      if (!tokenMatches(request.headers[INTERNAL_TOKEN_HEADER], token)) {
        return reply.status(401).send({ error: 'Unauthorized' });
      }
    });
  }

  app.setErrorHandler(async (error: Error & { validation?: unknown; statusCode?: number }, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Validation error',
        details: error.errors,
      });
    }
    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation error',
        details: error.validation,
      });
    }
    if (error instanceof AppError) {
      if (error.statusCode >= 500) request.log.error({ err: error }, error.message);
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        details: error.details,
      });
    }
    if (error.statusCode && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message });
    }
    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  app.register(healthRoutes);
  app.register(principalRoutes);

  app.addHook('onClose', async () => {
    if (!opts.db) db.close();
  });

  return app;
}
