/**
 * Gateway Protocol Types
 *
 * The normalized command shape every wire protocol is parsed into, the
 * outcome types of parsing and dispatch, and the frames exchanged on the
 * `/ws` socket.
 */

/** A normalized "do `name` to `targetId` with `argument`" request. */
export interface Command {
  readonly targetId: string;
  readonly name: string;
  readonly argument?: string;
}

/** An internal event as published to the listener registry. */
export interface EventEnvelope<TDetails = unknown> {
  readonly message: string;
  readonly details: TDetails;
}

export type ParseFailureKind = 'MalformedFrame' | 'CommandNotSupported';

export type DispatchFailureKind = 'UnknownTarget' | 'UnknownCommand' | 'InvocationFailed';

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseFailureKind; reason: string };

export type DispatchResult =
  | { ok: true; value: unknown }
  | { ok: false; error: DispatchFailureKind; message: string; cause?: unknown };

/** What a single text frame on the socket asks for. */
export type SocketRequest = { type: 'command'; command: Command } | { type: 'list-players' };

/** Literal frame that requests the player listing instead of a command. */
export const LIST_PLAYERS_FRAME = 'players';

/** Outbound socket frame. Broadcast envelopes are re-tagged into this shape. */
export interface SocketMessage<TDetails = unknown> {
  message: string;
  message_details: TDetails;
}

export interface CommandResultDetails {
  player_id: string;
  cmd: string;
  result: unknown;
}

export interface CommandErrorDetails {
  error: ParseFailureKind | DispatchFailureKind;
  message: string;
  frame: string;
}

export const SOCKET_MESSAGES = {
  PLAYERS: 'players',
  COMMAND_RESULT: 'command_result',
  COMMAND_ERROR: 'command_error',
} as const;

/** Legacy JSON-RPC replies. These two strings are the whole contract. */
export const LEGACY_REPLY = {
  SUCCESS: 'success',
  NOT_SUPPORTED: 'command not supported',
} as const;
