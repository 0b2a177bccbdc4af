/**
 * ClientRegistry — the set of live connections, guarded by one lock.
 *
 * A connection is a member from the moment its handshake succeeds until its
 * session loop exits. Every read and every write of the member set goes
 * through the same {@link Mutex}, so a broadcast in progress holds off
 * connects and disconnects until it has written to every member.
 */

import { Mutex } from "./mutex.js";
import { RegistryError } from "./errors.js";

export class ClientRegistry<T extends object> {
  private readonly members = new Set<T>();
  private readonly lock = new Mutex();

  /** Register a connection. Adding a current member is a contract violation. */
  async add(connection: T): Promise<void> {
    await this.lock.runExclusive(() => {
      if (this.members.has(connection)) {
        throw new RegistryError("Connection is already registered");
      }
      this.members.add(connection);
    });
  }

  /** Unregister a connection. Removing a non-member is a contract violation. */
  async remove(connection: T): Promise<void> {
    await this.lock.runExclusive(() => {
      if (!this.members.delete(connection)) {
        throw new RegistryError("Connection is not registered");
      }
    });
  }

  async has(connection: T): Promise<boolean> {
    return this.lock.runExclusive(() => this.members.has(connection));
  }

  async size(): Promise<number> {
    return this.lock.runExclusive(() => this.members.size);
  }

  /** Copy of the current members, in insertion order. */
  async snapshot(): Promise<T[]> {
    return this.lock.runExclusive(() => Array.from(this.members));
  }

  /**
   * Visit every member with the lock held for the whole iteration.
   *
   * `fn` is awaited before moving on. It must not call back into this
   * registry, which would wait on the lock it is running under.
   */
  async forEach(fn: (connection: T) => void | Promise<void>): Promise<void> {
    await this.lock.runExclusive(async () => {
      for (const connection of this.members) {
        await fn(connection);
      }
    });
  }
}
