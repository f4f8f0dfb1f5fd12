import type { QueryResult, QueryResultRow } from 'pg';
import type { NewUser, User } from '../../domain/user/user.js';
import type { StoreCallOptions, UserStore } from '../../application/users/userStore.js';
import { InternalError, RequestAbortedError } from '../../application/errors.js';
import { classifyPgError } from './pgErrors.js';

/**
 * The slice of pg.Pool the store relies on.
 */
export interface DbClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  release(err?: Error | boolean): void;
}

export interface DbPool {
  connect(): Promise<DbClient>;
}

interface UserRow {
  id: string; // BIGSERIAL comes back as a string
  username: string;
  email: string;
  password: string;
  created_at: Date;
}

const INSERT_USER = `
  INSERT INTO users (username, password, email)
  VALUES ($1, $2, $3)
  RETURNING id, username, email, password, created_at
`;

export class PgUserStore implements UserStore {
  constructor(private pool: DbPool) {}

  async create(user: NewUser, options: StoreCallOptions = {}): Promise<User> {
    const result = await this.run<UserRow>(
      INSERT_USER,
      [user.username, user.passwordHash, user.email],
      options.signal
    );

    const row = result.rows[0];
    const id = Number(row.id);
    if (!Number.isSafeInteger(id)) {
      throw new InternalError(`User id ${row.id} is outside the safe integer range`);
    }
    return {
      id,
      username: row.username,
      email: row.email,
      passwordHash: row.password,
      createdAt: row.created_at,
    };
  }

  async ping(options: StoreCallOptions = {}): Promise<void> {
    await this.run('SELECT 1', [], options.signal);
  }

  /**
   * Run one statement on a dedicated client. If the signal fires mid-query the
   * client is destroyed instead of returned to the pool, which ends the
   * statement's connection.
   */
  private async run<R extends QueryResultRow>(
    text: string,
    values: unknown[],
    signal?: AbortSignal
  ): Promise<QueryResult<R>> {
    if (signal?.aborted) {
      throw new RequestAbortedError();
    }

    const client = await this.pool.connect().catch((err: unknown) => {
      throw classifyPgError(err);
    });

    if (signal?.aborted) {
      client.release();
      throw new RequestAbortedError();
    }

    let destroyed = false;
    const onAbort = () => {
      destroyed = true;
      client.release(new RequestAbortedError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await client.query<R>(text, values);
    } catch (err) {
      if (signal?.aborted) {
        throw new RequestAbortedError();
      }
      throw classifyPgError(err);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!destroyed) {
        client.release();
      }
    }
  }
}
