import { argon2id, hash } from 'argon2';

export class Password {
  /** argon2id with a fresh salt per call; the result is what the users.password column holds. */
  static hash(plainPassword: string): Promise<string> {
    return hash(plainPassword, { type: argon2id });
  }
}
