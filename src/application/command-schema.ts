import { z } from 'zod';
import type { ClientCommand } from '../domain/index.js';

/**
 * Zod schema for an inbound live-channel envelope.
 *
 * `cmd` must be a non-empty string; `data` is open-ended and may be absent.
 * Extra keys are stripped.
 */
export const commandEnvelopeSchema = z.object({
  cmd: z.string().min(1),
  data: z.unknown(),
});

export type CommandEnvelope = z.infer<typeof commandEnvelopeSchema>;

export type DecodeResult =
  | { readonly ok: true; readonly command: ClientCommand }
  | { readonly ok: false; readonly reason: string };

function toCommand(envelope: CommandEnvelope): ClientCommand {
  switch (envelope.cmd) {
    case 'event':
      return { kind: 'event', data: envelope.data };
    case 'control':
      return { kind: 'control', data: envelope.data };
    default:
      return { kind: 'unknown', cmd: envelope.cmd, data: envelope.data };
  }
}

/**
 * Decodes a raw text frame into a `ClientCommand`.
 *
 * Returns a discriminated result so the gateway decides how to surface
 * malformed input; never throws.
 */
export function decodeCommand(raw: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = commandEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'envelope';
    return { ok: false, reason: `${path}: ${issue?.message ?? 'invalid envelope'}` };
  }

  return { ok: true, command: toCommand(parsed.data) };
}
