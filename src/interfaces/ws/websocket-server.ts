import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Socket } from 'node:net';
import { createHash } from 'node:crypto';
import type { BaseLogger } from 'pino';
import type { DashboardGateway, GatewaySession, LiveConnection } from '../../application/index.js';
import { CONNECTION_ROLES } from '../../domain/index.js';
import type { ConnectionRole } from '../../domain/index.js';
import {
  CloseCode,
  FrameError,
  Opcode,
  encodeCloseFrame,
  encodeFrame,
  encodeTextFrame,
  tryParseFrame,
} from './frame-codec.js';

/**
 * Live-channel WebSocket server on raw Node.js HTTP upgrade.
 *
 * Implements RFC 6455 for:
 * - accepting clients on the configured path, role chosen by `?role=`
 * - text messages, including fragmented ones, handed to the gateway
 * - incoming PING → respond PONG immediately
 * - incoming CLOSE → echo close + teardown
 *
 * Idle clients are never dropped by the server; a connection ends on a
 * close frame, a socket error or a failed send.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-5AB9FC11CF97';

export const DEFAULT_SOCKET_PATH = '/socket';
export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;

/** How long a peer gets to finish the close handshake before the socket is destroyed. */
const CLOSE_GRACE_MS = 1_000;

const utf8 = new TextDecoder('utf-8', { fatal: true });

export interface WebSocketServerOptions {
  path?: string;
  maxPayloadBytes?: number;
}

interface WsClient {
  socket: Socket;
  remoteAddress: string;
  closed: boolean;
  buffer: Buffer;
  /** Opcode of the fragmented message in progress, if any. */
  fragmentOpcode: number | null;
  fragments: Buffer[];
  fragmentBytes: number;
  session: GatewaySession | null;
}

function isConnectionRole(value: string): value is ConnectionRole {
  return CONNECTION_ROLES.some((role) => role === value);
}

export class WebSocketServer {
  private readonly clients: Set<WsClient> = new Set();
  private readonly gateway: DashboardGateway;
  private readonly log: BaseLogger;
  private readonly path: string;
  private readonly maxPayloadBytes: number;

  constructor(gateway: DashboardGateway, log: BaseLogger, options: WebSocketServerOptions = {}) {
    this.gateway = gateway;
    this.log = log;
    this.path = options.path ?? DEFAULT_SOCKET_PATH;
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket, head: Buffer) => {
      // Cast: Node.js upgrade socket is always net.Socket
      this.handleUpgrade(req, socket as Socket, head);
    });

    this.log.info({ path: this.path }, 'WebSocket server attached');
  }

  handleUpgrade(req: IncomingMessage, sock: Socket, head: Buffer): void {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (url.pathname !== this.path) {
      sock.destroy();
      return;
    }

    const key = req.headers['sec-websocket-key'];
    if (!key || Array.isArray(key)) {
      sock.destroy();
      return;
    }

    const requestedRole = url.searchParams.get('role') ?? 'subscriber';
    if (!isConnectionRole(requestedRole)) {
      this.log.warn({ role: requestedRole }, 'WebSocket upgrade refused: unknown role');
      sock.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
      return;
    }

    const accept = createHash('sha1')
      .update(key + WS_GUID)
      .digest('base64');

    sock.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${accept}\r\n` +
        '\r\n',
    );

    // After the upgrade the HTTP parser pushes EOF into the readable side;
    // with allowHalfOpen=false that ends the socket before any frame flows.
    sock.allowHalfOpen = true;
    // Clear any HTTP-inherited timeout (requestTimeout, keepAliveTimeout).
    sock.setTimeout(0);
    sock.setNoDelay(true);
    sock.setKeepAlive(true, 30_000);

    const client: WsClient = {
      socket: sock,
      remoteAddress: sock.remoteAddress ?? 'unknown',
      closed: false,
      buffer: Buffer.alloc(0),
      fragmentOpcode: null,
      fragments: [],
      fragmentBytes: 0,
      session: null,
    };

    this.clients.add(client);

    const connection: LiveConnection = {
      remoteAddress: client.remoteAddress,
      send: (data: string) => this.sendText(client, data),
      close: () => this.closeWithCode(client, 'evicted', CloseCode.GOING_AWAY),
    };

    /* — TCP data — */
    sock.on('data', (chunk: Buffer) => this.onData(client, chunk));

    /* — Lifecycle events — */
    sock.on('end', () => {
      // Spurious readable EOF right after the upgrade; real disconnects
      // arrive as 'close'.
      this.log.debug({ remoteAddress: client.remoteAddress }, 'Socket end event (readable EOF, ignored)');
    });

    sock.on('close', (hadError: boolean) => {
      this.gracefulClose(client, hadError ? 'close_error' : 'close');
    });

    sock.on('error', (err: Error) => {
      if (!client.closed) {
        this.log.debug({ remoteAddress: client.remoteAddress, err: String(err) }, 'Socket error event');
      }
      this.gracefulClose(client, 'error');
    });

    client.session = this.gateway.open(connection, requestedRole);

    if (head.length > 0) {
      this.onData(client, head);
    }

    // After HTTP upgrade the parser may leave the socket paused.
    sock.resume();
  }

  /* ------------------------------------------------------------------ */
  /*  Public helpers                                                     */
  /* ------------------------------------------------------------------ */

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    for (const client of [...this.clients]) {
      this.closeWithCode(client, 'server_shutdown', CloseCode.GOING_AWAY);
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Private — inbound                                                 */
  /* ------------------------------------------------------------------ */

  private onData(client: WsClient, chunk: Buffer): void {
    if (client.closed) return;

    client.buffer = Buffer.concat([client.buffer, chunk]);

    // consume as many complete frames as possible
    while (client.buffer.length > 0 && !client.closed) {
      let frame: ReturnType<typeof tryParseFrame>;
      try {
        frame = tryParseFrame(client.buffer, this.maxPayloadBytes);
      } catch (err: unknown) {
        const code = err instanceof FrameError ? err.closeCode : CloseCode.PROTOCOL_ERROR;
        this.log.warn(
          { remoteAddress: client.remoteAddress, err },
          'WebSocket frame parse error, closing client',
        );
        this.closeWithCode(client, 'frame_parse_error', code);
        return;
      }

      if (!frame) break; // need more bytes

      client.buffer = client.buffer.subarray(frame.nextOffset);

      switch (frame.opcode) {
        case Opcode.PONG:
          continue;
        case Opcode.PING:
          this.safeWrite(client, encodeFrame(Opcode.PONG, frame.payload));
          continue;
        case Opcode.CLOSE:
          this.log.debug({ remoteAddress: client.remoteAddress }, 'Close frame received from client');
          this.gracefulClose(client, 'close_frame', encodeFrame(Opcode.CLOSE, frame.payload));
          return;
        case Opcode.TEXT:
        case Opcode.BINARY:
        case Opcode.CONTINUATION:
          this.onDataFrame(client, frame.opcode, frame.fin, frame.payload);
          continue;
        default:
          this.closeWithCode(client, 'unknown_opcode', CloseCode.PROTOCOL_ERROR);
          return;
      }
    }
  }

  private onDataFrame(client: WsClient, opcode: number, fin: boolean, payload: Buffer): void {
    if (opcode === Opcode.CONTINUATION) {
      if (client.fragmentOpcode === null) {
        this.closeWithCode(client, 'unexpected_continuation', CloseCode.PROTOCOL_ERROR);
        return;
      }
    } else {
      if (client.fragmentOpcode !== null) {
        this.closeWithCode(client, 'interleaved_message', CloseCode.PROTOCOL_ERROR);
        return;
      }
      client.fragmentOpcode = opcode;
    }

    client.fragments.push(payload);
    client.fragmentBytes += payload.length;
    if (client.fragmentBytes > this.maxPayloadBytes) {
      this.closeWithCode(client, 'message_too_large', CloseCode.TOO_LARGE);
      return;
    }

    if (!fin) return;

    const messageOpcode = client.fragmentOpcode;
    const message = Buffer.concat(client.fragments);
    client.fragmentOpcode = null;
    client.fragments = [];
    client.fragmentBytes = 0;

    if (messageOpcode !== Opcode.TEXT) {
      this.log.debug({ remoteAddress: client.remoteAddress }, 'Binary message ignored');
      return;
    }

    let text: string;
    try {
      text = utf8.decode(message);
    } catch (err: unknown) {
      this.log.warn({ remoteAddress: client.remoteAddress, err }, 'Text message is not valid UTF-8, ignored');
      return;
    }

    client.session?.receive(text);
  }

  /* ------------------------------------------------------------------ */
  /*  Private — outbound and lifecycle                                  */
  /* ------------------------------------------------------------------ */

  /** Throws when the transport is gone, which the router treats as loss. */
  private sendText(client: WsClient, data: string): void {
    if (client.closed || client.socket.destroyed) {
      throw new Error('WebSocket connection is closed');
    }
    client.socket.write(encodeTextFrame(data));
  }

  /**
   * Write to socket with error guard.  Returns true on success.
   */
  private safeWrite(client: WsClient, data: Buffer): boolean {
    if (client.closed || client.socket.destroyed) return false;
    try {
      client.socket.write(data);
      return true;
    } catch (err: unknown) {
      this.log.debug({ remoteAddress: client.remoteAddress, err }, 'Socket write failed');
      this.gracefulClose(client, 'write_error');
      return false;
    }
  }

  private closeWithCode(client: WsClient, reason: string, code: number): void {
    this.gracefulClose(client, reason, encodeCloseFrame(code, reason));
  }

  /**
   * Idempotent teardown. With a `closeFrame` the socket is ended after it
   * flushes, and destroyed if the peer is still there after CLOSE_GRACE_MS.
   */
  private gracefulClose(client: WsClient, reason: string, closeFrame?: Buffer): void {
    if (client.closed) return;

    client.closed = true;
    this.clients.delete(client);

    const { socket } = client;
    if (!socket.destroyed) {
      if (closeFrame === undefined) {
        socket.destroy();
      } else {
        try {
          socket.end(closeFrame);
          socket.setTimeout(CLOSE_GRACE_MS, () => socket.destroy());
        } catch (err: unknown) {
          this.log.debug({ remoteAddress: client.remoteAddress, err }, 'Close frame write failed');
          socket.destroy();
        }
      }
    }

    client.session?.close(reason);

    this.log.debug(
      { remoteAddress: client.remoteAddress, reason, clientCount: this.clients.size },
      'WebSocket client disconnected',
    );
  }
}
