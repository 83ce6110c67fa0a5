/**
 * Live-channel message vocabulary.
 *
 * Clients send `{ cmd, data }` envelopes; the server sends
 * `{ command, data }`. Inbound envelopes are decoded into `ClientCommand`,
 * a tagged union with an explicit `unknown` variant so new command names
 * from newer peers are carried through and ignored instead of failing.
 */

/** Role a live connection plays for the lifetime of the connection. */
export type ConnectionRole = 'subscriber' | 'source';

export const CONNECTION_ROLES: readonly ConnectionRole[] = ['subscriber', 'source'];

export type ClientCommand =
  /** Upstream event from a source, relayed to every subscriber. */
  | { readonly kind: 'event'; readonly data: unknown }
  /** Dashboard instruction from a subscriber, relayed to every source. */
  | { readonly kind: 'control'; readonly data: unknown }
  | { readonly kind: 'unknown'; readonly cmd: string; readonly data: unknown };

export type ServerMessage =
  | { readonly command: 'register'; readonly data: string }
  | { readonly command: 'snapshot'; readonly data: unknown }
  | { readonly command: 'event'; readonly data: unknown }
  | { readonly command: 'control'; readonly data: unknown };
