import type { BaseLogger } from 'pino';
import type { ServerMessage } from '../domain/index.js';
import type { ConnectionRegistry, RegisteredConnection } from './connection-registry.js';

export interface BroadcastResult {
  readonly delivered: number;
  /** Ids whose transport failed; they have been deregistered. */
  readonly failed: readonly string[];
}

/**
 * Fans server messages out to registered connections.
 *
 * Each call serializes once and writes to every target. A target whose
 * write throws counts as a lost connection: it is deregistered and closed
 * after the loop, and the remaining targets still get the message.
 * Nothing is thrown back to the caller.
 */
export class BroadcastRouter {
  private readonly registry: ConnectionRegistry;
  private readonly log: BaseLogger;

  constructor(registry: ConnectionRegistry, log: BaseLogger) {
    this.registry = registry;
    this.log = log;
  }

  broadcastToSubscribers(
    message: ServerMessage,
    targets: readonly RegisteredConnection[] = this.registry.list('subscriber'),
  ): BroadcastResult {
    return this.fanOut(message, targets);
  }

  broadcastToSources(message: ServerMessage): BroadcastResult {
    return this.fanOut(message, this.registry.list('source'));
  }

  /** Delivers to a single connection. Returns false if it was lost. */
  sendTo(target: RegisteredConnection, message: ServerMessage): boolean {
    return this.fanOut(message, [target]).delivered === 1;
  }

  private fanOut(message: ServerMessage, targets: readonly RegisteredConnection[]): BroadcastResult {
    const data = JSON.stringify(message);
    const lost: RegisteredConnection[] = [];
    let delivered = 0;

    for (const target of targets) {
      try {
        target.connection.send(data);
        delivered++;
      } catch (err: unknown) {
        this.log.warn(
          { id: target.id, role: target.role, command: message.command, err },
          'Send failed, dropping connection',
        );
        lost.push(target);
      }
    }

    for (const target of lost) {
      this.evict(target);
    }

    if (targets.length > 1) {
      this.log.debug(
        { command: message.command, targets: targets.length, delivered },
        'Broadcast complete',
      );
    }

    return { delivered, failed: lost.map((t) => t.id) };
  }

  private evict(target: RegisteredConnection): void {
    this.registry.deregister(target.id, target.role);
    try {
      target.connection.close();
    } catch (err: unknown) {
      this.log.debug({ id: target.id, err }, 'Close after failed send also failed');
    }
  }
}
