import { randomUUID } from 'node:crypto';
import type { BaseLogger } from 'pino';
import type { ConnectionRole } from '../domain/index.js';

/**
 * Transport-side handle for one live connection.
 *
 * `send` writes a serialized message and throws when the transport has
 * failed; `close` tears the transport down and is safe to call twice.
 */
export interface LiveConnection {
  readonly remoteAddress: string;
  send(data: string): void;
  close(): void;
}

export interface RegisteredConnection {
  readonly id: string;
  readonly role: ConnectionRole;
  readonly connection: LiveConnection;
}

/**
 * Owned table of open live connections, one map per role.
 *
 * All mutations are synchronous, so on the single Node.js event loop each
 * register/deregister is atomic with respect to every other handler.
 * `list()` hands out frozen snapshots: a broadcast iterating one is not
 * affected by connections that open or close mid-fan-out.
 */
export class ConnectionRegistry {
  private readonly tables: Record<ConnectionRole, Map<string, LiveConnection>> = {
    subscriber: new Map(),
    source: new Map(),
  };

  private readonly log: BaseLogger;
  private readonly generateId: () => string;

  constructor(log: BaseLogger, generateId: () => string = randomUUID) {
    this.log = log;
    this.generateId = generateId;
  }

  /** Inserts `connection` under a fresh id and returns the id. */
  register(role: ConnectionRole, connection: LiveConnection): string {
    let id = this.generateId();
    while (this.has(id)) {
      this.log.warn({ id }, 'Generated connection id already in use, drawing another');
      id = this.generateId();
    }

    this.tables[role].set(id, connection);
    this.log.debug(
      { id, role, remoteAddress: connection.remoteAddress, count: this.tables[role].size },
      'Connection registered',
    );
    return id;
  }

  /**
   * Removes `id` from the role's table. Returns false when it was not
   * there, which covers double close and eviction racing a peer close.
   */
  deregister(id: string, role: ConnectionRole): boolean {
    const removed = this.tables[role].delete(id);
    if (removed) {
      this.log.debug({ id, role, count: this.tables[role].size }, 'Connection deregistered');
    }
    return removed;
  }

  list(role: ConnectionRole): readonly RegisteredConnection[] {
    const snapshot: RegisteredConnection[] = [];
    for (const [id, connection] of this.tables[role]) {
      snapshot.push(Object.freeze({ id, role, connection }));
    }
    return Object.freeze(snapshot);
  }

  get(id: string, role: ConnectionRole): LiveConnection | undefined {
    return this.tables[role].get(id);
  }

  size(role: ConnectionRole): number {
    return this.tables[role].size;
  }

  private has(id: string): boolean {
    return this.tables.subscriber.has(id) || this.tables.source.has(id);
  }
}
