import type { BaseLogger } from 'pino';
import type { ClientCommand, ConnectionRole, ServerMessage } from '../domain/index.js';
import { decodeCommand } from './command-schema.js';
import type { BroadcastRouter } from './broadcast-router.js';
import type { ConnectionRegistry, LiveConnection, RegisteredConnection } from './connection-registry.js';

export type SessionState = 'connecting' | 'open' | 'closed';

/**
 * Builds the message pushed to a connection right after `register`.
 * Returning null sends nothing.
 */
export type SnapshotProvider = (connection: RegisteredConnection) => ServerMessage | null;

export interface DashboardGatewayOptions {
  registry: ConnectionRegistry;
  router: BroadcastRouter;
  log: BaseLogger;
  snapshot?: SnapshotProvider;
}

/**
 * Lifecycle of one live connection: connecting → open → closed.
 *
 * The transport calls `receive` for every text message and `close` once
 * the peer goes away; `close` is idempotent, so transport errors, peer
 * close frames and broadcast eviction may all report the same loss.
 */
export class GatewaySession {
  readonly role: ConnectionRole;
  private readonly connection: LiveConnection;
  private readonly options: DashboardGatewayOptions;
  private current: SessionState = 'connecting';
  private id: string | null = null;

  constructor(connection: LiveConnection, role: ConnectionRole, options: DashboardGatewayOptions) {
    this.connection = connection;
    this.role = role;
    this.options = options;
  }

  get state(): SessionState {
    return this.current;
  }

  /** Registry id, assigned on open. */
  get connectionId(): string | null {
    return this.id;
  }

  start(): void {
    if (this.current !== 'connecting') return;

    const { registry, router, log } = this.options;
    const id = registry.register(this.role, this.connection);
    this.id = id;
    this.current = 'open';

    log.info(
      { id, role: this.role, remoteAddress: this.connection.remoteAddress },
      'Live connection opened',
    );

    const self: RegisteredConnection = { id, role: this.role, connection: this.connection };
    if (!router.sendTo(self, { command: 'register', data: id })) return;

    const snapshot = this.buildSnapshot(self);
    if (snapshot !== null) {
      router.sendTo(self, snapshot);
    }
  }

  receive(raw: string): void {
    const { log } = this.options;

    if (this.current !== 'open') {
      log.debug({ id: this.id, state: this.current }, 'Message outside open state ignored');
      return;
    }

    log.debug({ id: this.id, raw }, 'Message from live client');

    const result = decodeCommand(raw);
    if (!result.ok) {
      log.warn(
        { id: this.id, remoteAddress: this.connection.remoteAddress, reason: result.reason },
        'Malformed live-channel message ignored',
      );
      return;
    }

    this.dispatch(result.command);
  }

  close(reason: string): void {
    if (this.current === 'closed') return;
    this.current = 'closed';

    if (this.id !== null) {
      this.options.registry.deregister(this.id, this.role);
    }

    this.options.log.info(
      { id: this.id, role: this.role, remoteAddress: this.connection.remoteAddress, reason },
      'Live connection closed',
    );
  }

  private dispatch(command: ClientCommand): void {
    const { router, log } = this.options;

    switch (command.kind) {
      case 'event':
        if (this.role !== 'source') {
          log.debug({ id: this.id, kind: command.kind }, 'Command not accepted from this role');
          return;
        }
        router.broadcastToSubscribers({ command: 'event', data: command.data });
        return;
      case 'control':
        if (this.role !== 'subscriber') {
          log.debug({ id: this.id, kind: command.kind }, 'Command not accepted from this role');
          return;
        }
        router.broadcastToSources({ command: 'control', data: command.data });
        return;
      case 'unknown':
        log.debug({ id: this.id, cmd: command.cmd }, 'Unknown command ignored');
        return;
      default: {
        const unreachable: never = command;
        return unreachable;
      }
    }
  }

  private buildSnapshot(self: RegisteredConnection): ServerMessage | null {
    const { snapshot, log } = this.options;
    if (snapshot === undefined) return null;

    try {
      return snapshot(self);
    } catch (err: unknown) {
      log.warn({ id: self.id, err }, 'Initial snapshot failed, skipping');
      return null;
    }
  }
}

/**
 * Entry point the transport uses to hand over freshly accepted
 * connections.
 */
export class DashboardGateway {
  private readonly options: DashboardGatewayOptions;

  constructor(options: DashboardGatewayOptions) {
    this.options = options;
  }

  open(connection: LiveConnection, role: ConnectionRole): GatewaySession {
    const session = new GatewaySession(connection, role, this.options);
    session.start();
    return session;
  }
}
