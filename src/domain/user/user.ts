/**
 * User account as persisted by the store.
 * `id` and `createdAt` only exist once the row has been written.
 */
export interface User {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

/**
 * Input for a user that has not been persisted yet.
 */
export interface NewUser {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
}
