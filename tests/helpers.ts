import { EventEmitter } from 'node:events';
import { vi } from 'vitest';
import type { BaseLogger } from 'pino';
import type { LiveConnection } from '../src/application/index.js';
import type {
  AssignmentRecord,
  HitRecord,
  PairingRecord,
  RunRecord,
  WorkerRecord,
} from '../src/domain/index.js';

export function fakeLogger() {
  return {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  } as unknown as BaseLogger;
}

/** LiveConnection that records what it is sent. */
export class FakeConnection implements LiveConnection {
  readonly remoteAddress: string;
  readonly sent: string[] = [];
  closeCalls = 0;
  failing = false;

  constructor(remoteAddress = '10.0.0.1') {
    this.remoteAddress = remoteAddress;
  }

  send(data: string): void {
    if (this.failing) throw new Error('transport failed');
    this.sent.push(data);
  }

  close(): void {
    this.closeCalls++;
  }

  messages(): unknown[] {
    return this.sent.map((s): unknown => JSON.parse(s));
  }
}

/** Stand-in for the net.Socket handed over on HTTP upgrade. */
export class FakeSocket extends EventEmitter {
  readonly writes: Buffer[] = [];
  remoteAddress: string | undefined = '10.0.0.9';
  destroyed = false;
  allowHalfOpen = false;

  write(data: string | Buffer): boolean {
    this.writes.push(typeof data === 'string' ? Buffer.from(data) : data);
    return true;
  }

  ended = false;

  end(data?: string | Buffer): this {
    if (data !== undefined) this.write(data);
    this.ended = true;
    return this;
  }

  destroy(): this {
    this.destroyed = true;
    return this;
  }

  setTimeout(): this {
    return this;
  }

  setNoDelay(): this {
    return this;
  }

  setKeepAlive(): this {
    return this;
  }

  resume(): this {
    return this;
  }
}

/** Builds a masked client frame the way a browser would. */
export function clientFrame(opcode: number, payload: Buffer | string, fin = true): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;
  const mask = Buffer.from([0x12, 0x34, 0x56, 0x78]);

  let header: Buffer;
  if (body.length < 126) {
    header = Buffer.from([(fin ? 0x80 : 0) | opcode, 0x80 | body.length]);
  } else {
    header = Buffer.alloc(4);
    header[0] = (fin ? 0x80 : 0) | opcode;
    header[1] = 0x80 | 126;
    header.writeUInt16BE(body.length, 2);
  }

  const masked = Buffer.alloc(body.length);
  for (let i = 0; i < body.length; i++) {
    masked[i] = (body[i] ?? 0) ^ (mask[i % 4] ?? 0);
  }

  return Buffer.concat([header, mask, masked]);
}

export interface ServerFrame {
  opcode: number;
  payload: Buffer;
}

/** Splits the unmasked frames a server wrote back to back. */
export function readServerFrames(buf: Buffer): ServerFrame[] {
  const frames: ServerFrame[] = [];
  let offset = 0;
  while (offset + 2 <= buf.length) {
    const opcode = (buf[offset] ?? 0) & 0x0f;
    let length = (buf[offset + 1] ?? 0) & 0x7f;
    let start = offset + 2;
    if (length === 126) {
      length = buf.readUInt16BE(start);
      start += 2;
    } else if (length === 127) {
      length = Number(buf.readBigUInt64BE(start));
      start += 8;
    }
    frames.push({ opcode, payload: buf.subarray(start, start + length) });
    offset = start + length;
  }
  return frames;
}

export function run(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    run_id: 'run-1',
    created: 1_700_000_000,
    maximum: 10,
    completed: 4,
    failed: 1,
    taskname: 'qa-collection',
    launch_time: 1_700_000_100,
    sandbox: true,
    ...overrides,
  };
}

export function hit(overrides: Partial<HitRecord> = {}): HitRecord {
  return {
    hit_id: 'hit-1',
    expiration: 1_700_086_400,
    hit_status: 'Assignable',
    assignments_pending: 0,
    assignments_available: 1,
    assignments_complete: 0,
    run_id: 'run-1',
    ...overrides,
  };
}

export function assignment(overrides: Partial<AssignmentRecord> = {}): AssignmentRecord {
  return {
    assignment_id: 'asg-1',
    status: 'Submitted',
    approve_time: null,
    worker_id: 'worker-1',
    hit_id: 'hit-1',
    ...overrides,
  };
}

export function worker(overrides: Partial<WorkerRecord> = {}): WorkerRecord {
  return {
    worker_id: 'worker-1',
    accepted: 3,
    disconnected: 0,
    expired: 0,
    completed: 2,
    approved: 2,
    rejected: 0,
    ...overrides,
  };
}

export function pairing(overrides: Partial<PairingRecord> = {}): PairingRecord {
  return {
    assignment_id: 'asg-1',
    status: 'done',
    onboarding_start: null,
    onboarding_end: null,
    task_start: 1_700_000_200,
    task_end: 1_700_000_500,
    conversation_id: 'conv-1',
    bonus_amount: null,
    bonus_text: null,
    bonus_paid: false,
    notes: null,
    onboarding_id: null,
    worker_id: 'worker-1',
    run_id: 'run-1',
    ...overrides,
  };
}
