/**
 * User registry: username -> public commitment (y1, y2).
 *
 * The interface is async so a persistent store can sit behind it; the bundled
 * implementation keeps records in memory for the life of the process.
 */
import { AlreadyExistsError } from '../errors.js';
import type { Statement } from '../protocol/types.js';

export interface UserRecord<E> {
  username: string;
  statement: Statement<E>;
  registeredAt: number;
}

export interface UserRegistry<E> {
  get(username: string): Promise<UserRecord<E> | undefined>;
  /**
   * Store a record.
   * @throws AlreadyExistsError when the user exists and `overwrite` is false.
   */
  put(record: UserRecord<E>, overwrite: boolean): Promise<void>;
  /** Returns false when no record existed. */
  delete(username: string): Promise<boolean>;
}

export class InMemoryUserRegistry<E> implements UserRegistry<E> {
  private readonly users = new Map<string, UserRecord<E>>();

  async get(username: string): Promise<UserRecord<E> | undefined> {
    return this.users.get(username);
  }

  async put(record: UserRecord<E>, overwrite: boolean): Promise<void> {
    if (!overwrite && this.users.has(record.username)) {
      throw new AlreadyExistsError(record.username);
    }
    this.users.set(record.username, record);
  }

  async delete(username: string): Promise<boolean> {
    return this.users.delete(username);
  }

  get size(): number {
    return this.users.size;
  }
}
