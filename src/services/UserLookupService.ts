import type { ZodType, ZodTypeDef } from 'zod';
import {
  InvalidRowError,
  NoResultError,
  NonUniqueResultError,
  type QueryExecutor,
  type Row,
} from '../database/QueryExecutor';
import { AmbiguousUserError, UserNotFoundError } from '../errors/AppError';
import { AuthorityRowSchema, UserRowSchema, type UserRow } from '../schemas';

export const DEF_USERS_BY_USERNAME_QUERY =
  'SELECT username, email, password, enabled FROM users WHERE username = ?';
export const DEF_USERS_BY_EMAIL_QUERY =
  'SELECT username, email, password, enabled FROM users WHERE email = ?';
export const DEF_AUTHORITIES_BY_USERNAME_QUERY =
  'SELECT username, authority FROM authorities WHERE username = ?';

export type GrantedAuthority = string;

export interface Principal {
  username: string;
  email: string;
  password: string;
  enabled: boolean;
  authorities: readonly GrantedAuthority[];
}

export interface UserLookupConfig {
  usersByUsernameQuery: string;
  usersByEmailQuery: string;
  authoritiesByUsernameQuery: string;
  /** Prepended to every authority read from the store, e.g. `ROLE_`. */
  rolePrefix: string;
  /**
   * When true (default) the returned principal carries the username read from
   * the user row; when false, the username the caller looked up with.
   */
  usernameBasedPrimaryKey: boolean;
}

/** Appends authorities beyond the ones loaded from the store. */
export type AuthorityAugmenter = (
  username: string,
  authorities: readonly GrantedAuthority[],
) => readonly GrantedAuthority[];

export interface UserLookupOptions {
  addCustomAuthorities?: AuthorityAugmenter;
}

export const DEFAULT_USER_LOOKUP_CONFIG: Readonly<UserLookupConfig> = Object.freeze({
  usersByUsernameQuery: DEF_USERS_BY_USERNAME_QUERY,
  usersByEmailQuery: DEF_USERS_BY_EMAIL_QUERY,
  authoritiesByUsernameQuery: DEF_AUTHORITIES_BY_USERNAME_QUERY,
  rolePrefix: '',
  usernameBasedPrimaryKey: true,
});

function parseRow<T>(schema: ZodType<T, ZodTypeDef, unknown>, row: Row, query: string): T {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new InvalidRowError(
      query,
      result.error.issues.map(issue => `${issue.path.join('.') || '(row)'}: ${issue.message}`),
    );
  }
  return result.data;
}

export class UserLookupService {
  private readonly config: Readonly<UserLookupConfig>;
  private readonly addCustomAuthorities: AuthorityAugmenter;

  constructor(
    private executor: QueryExecutor,
    config: Partial<UserLookupConfig> = {},
    options: UserLookupOptions = {},
  ) {
    this.config = Object.freeze({ ...DEFAULT_USER_LOOKUP_CONFIG, ...config });
    this.addCustomAuthorities = options.addCustomAuthorities ?? ((_username, authorities) => authorities);
  }

  getConfig(): Readonly<UserLookupConfig> {
    return this.config;
  }

  lookupByUsername(username: string): Principal {
    const user = this.findUser(this.config.usersByUsernameQuery, username);
    const principalUsername = this.config.usernameBasedPrimaryKey ? user.username : username;
    return this.fillAuthorities(user, principalUsername);
  }

  lookupByEmail(email: string): Principal {
    const user = this.findUser(this.config.usersByEmailQuery, email);
    return this.fillAuthorities(user, user.username);
  }

  private findUser(query: string, identifier: string): UserRow {
    let row: Row;
    try {
      row = this.executor.getSingleResult(query, [identifier]);
    } catch (err) {
      if (err instanceof NoResultError) throw new UserNotFoundError(identifier);
      if (err instanceof NonUniqueResultError) throw new AmbiguousUserError(identifier, err.count);
      throw err;
    }
    return parseRow(UserRowSchema, row, query);
  }

  private fillAuthorities(user: UserRow, principalUsername: string): Principal {
    const query = this.config.authoritiesByUsernameQuery;
    const rows = this.executor.getResultList(query, [user.username]);
    const authorities = rows.map(row => this.config.rolePrefix + parseRow(AuthorityRowSchema, row, query).authority);

    return {
      username: principalUsername,
      email: user.email,
      password: user.password,
      enabled: user.enabled,
      authorities: [...this.addCustomAuthorities(user.username, authorities)],
    };
  }
}
