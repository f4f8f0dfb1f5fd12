import type { NewUser, User } from '../../domain/user/user.js';

export interface StoreCallOptions {
  /** Aborts the in-flight database work when the request goes away. */
  signal?: AbortSignal;
}

/**
 * Persistence boundary for users.
 *
 * Implementations reject only with the errors in `application/errors.ts`:
 * ConflictError on a duplicate username or email, UnavailableError when the
 * backend cannot be reached, RequestAbortedError when the signal fires, and
 * InternalError for everything else.
 */
export interface UserStore {
  create(user: NewUser, options?: StoreCallOptions): Promise<User>;
  ping(options?: StoreCallOptions): Promise<void>;
}
