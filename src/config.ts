import { z } from 'zod';
import {
  DEF_AUTHORITIES_BY_USERNAME_QUERY,
  DEF_USERS_BY_EMAIL_QUERY,
  DEF_USERS_BY_USERNAME_QUERY,
  type UserLookupConfig,
} from './services/UserLookupService';

type Env = Record<string, string | undefined>;

const EnvBoolSchema = z
  .string()
  .transform(v => v.toLowerCase())
  .pipe(z.enum(['1', 'true', 'yes', '0', 'false', 'no']))
  .transform(v => v === '1' || v === 'true' || v === 'yes');

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DB_PATH: z.string().min(1).default('./data/authority-lookup.db'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  INTERNAL_API_TOKEN: z.string().min(1).optional(),
  USERNAME_BASED_PRIMARY_KEY: EnvBoolSchema.default('true'),
});

export interface ServiceConfig {
  port: number;
  host: string;
  dbPath: string;
  logLevel: z.infer<typeof LogLevelSchema>;
  /** When set, lookup routes require a matching `x-internal-token` header. */
  internalApiToken?: string;
  lookup: Readonly<UserLookupConfig>;
}

// Empty strings count as unset so `FOO=` in a .env file falls back to the default.
function pick(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

export function loadConfig(env: Env = process.env): Readonly<ServiceConfig> {
  const server = ServerEnvSchema.parse({
    PORT: pick(env, 'PORT'),
    HOST: pick(env, 'HOST'),
    DB_PATH: pick(env, 'DB_PATH'),
    LOG_LEVEL: pick(env, 'LOG_LEVEL'),
    INTERNAL_API_TOKEN: pick(env, 'INTERNAL_API_TOKEN'),
    USERNAME_BASED_PRIMARY_KEY: pick(env, 'USERNAME_BASED_PRIMARY_KEY'),
  });

  const lookup: UserLookupConfig = Object.freeze({
    usersByUsernameQuery: pick(env, 'USERS_BY_USERNAME_QUERY') ?? DEF_USERS_BY_USERNAME_QUERY,
    usersByEmailQuery: pick(env, 'USERS_BY_EMAIL_QUERY') ?? DEF_USERS_BY_EMAIL_QUERY,
    authoritiesByUsernameQuery: pick(env, 'AUTHORITIES_BY_USERNAME_QUERY') ?? DEF_AUTHORITIES_BY_USERNAME_QUERY,
    // The prefix is the one setting where an empty value is meaningful.
    rolePrefix: env['ROLE_PREFIX'] ?? '',
    usernameBasedPrimaryKey: server.USERNAME_BASED_PRIMARY_KEY,
  });

  return Object.freeze({
    port: server.PORT,
    host: server.HOST,
    dbPath: server.DB_PATH,
    logLevel: server.LOG_LEVEL,
    internalApiToken: server.INTERNAL_API_TOKEN,
    lookup,
  });
}
