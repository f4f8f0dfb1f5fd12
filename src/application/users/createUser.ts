import { Password } from '../../domain/user/password.js';
import type { User } from '../../domain/user/user.js';
import type { UserStore } from './userStore.js';

export interface CreateUserCommand {
  username: string;
  email: string;
  password: string;
}

export class CreateUserUseCase {
  constructor(private userStore: UserStore) {}

  async execute(command: CreateUserCommand, signal?: AbortSignal): Promise<User> {
    const passwordHash = await Password.hash(command.password);

    // Uniqueness is left to the store's constraints; a pre-check would race.
    return await this.userStore.create(
      {
        username: command.username,
        email: command.email,
        passwordHash,
      },
      { signal }
    );
  }
}
