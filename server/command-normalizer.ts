/**
 * Command Normalizer
 *
 * Three independent parsers, one per wire protocol, that all produce the same
 * `Command`. They never throw: malformed input comes back as a tagged failure
 * so each protocol can answer it in its own way.
 *
 *   path-style     GET /api/players/:playerId/cmd/:cmd[/:cmdArgs]
 *   token-stream   "players/{playerId}/cmd/{cmd}[/{cmdArgs}]" text frames on /ws
 *   legacy-phrase  JSON-RPC params [playerId, ["mixer", "volume", "40"]]
 */

import {
  LIST_PLAYERS_FRAME,
  type Command,
  type ParseResult,
  type SocketRequest,
} from '@shared/gateway-protocol';

function malformed<T>(reason: string): ParseResult<T> {
  return { ok: false, error: 'MalformedFrame', reason };
}

function notSupported<T>(reason: string): ParseResult<T> {
  return { ok: false, error: 'CommandNotSupported', reason };
}

function command(targetId: string, name: string, argument?: string): Command {
  return argument === undefined
    ? Object.freeze({ targetId, name })
    : Object.freeze({ targetId, name, argument });
}

/**
 * Path-style commands arrive already split by the router. An absent
 * `commandArgs` means the command is invoked without an argument.
 */
export function parsePathCommand(
  targetId: string,
  commandName: string,
  commandArgs?: string
): ParseResult<Command> {
  if (!targetId) return malformed('player id is empty');
  if (!commandName) return malformed('command name is empty');
  return { ok: true, value: command(targetId, commandName, commandArgs) };
}

/**
 * Parse one text frame from the socket protocol.
 *
 * The bare frame `players` is a listing request, not a command. Everything
 * else must be `players/{id}/cmd/{name}` with an optional fifth `{arg}`
 * token; an empty fifth token counts as no argument.
 */
export function parseSocketFrame(frame: string): ParseResult<SocketRequest> {
  const line = frame.trim();
  if (line === LIST_PLAYERS_FRAME) {
    return { ok: true, value: { type: 'list-players' } };
  }

  const tokens = line.split('/');
  if (tokens.length < 4) {
    return malformed(`expected players/{id}/cmd/{command}, got ${tokens.length} token(s)`);
  }
  if (tokens.length > 5) {
    return malformed(`expected at most 5 tokens, got ${tokens.length}`);
  }

  const [marker, targetId, cmdMarker, name, argument] = tokens;
  if (marker !== 'players' || cmdMarker !== 'cmd') {
    return malformed('frame must start with players/{id}/cmd/');
  }
  if (!targetId) return malformed('player id is empty');
  if (!name) return malformed('command name is empty');

  return {
    ok: true,
    value: { type: 'command', command: command(targetId, name, argument || undefined) },
  };
}

/**
 * Map a legacy phrase onto a command.
 *
 * Exact phrases are checked before the `power` / `mixer volume` substring
 * rules so that `button power` toggles instead of being read as `power(power)`.
 */
export function parseLegacyPhrase(targetId: string, words: readonly string[]): ParseResult<Command> {
  const phrase = words.join(' ');
  if (!targetId) return notSupported('player id is empty');

  switch (phrase) {
    case 'play':
    case 'pause':
    case 'stop':
    case 'next':
    case 'previous':
      return { ok: true, value: command(targetId, phrase) };
    case 'button power':
      return { ok: true, value: command(targetId, 'powerToggle') };
    case 'playlist index +1':
      return { ok: true, value: command(targetId, 'next') };
    case 'playlist index -1':
      return { ok: true, value: command(targetId, 'previous') };
    case 'mixer muting 1':
      return { ok: true, value: command(targetId, 'volumeMute', 'true') };
    case 'mixer muting 0':
      return { ok: true, value: command(targetId, 'volumeMute', 'false') };
    case 'button volup':
      return { ok: true, value: command(targetId, 'volumeUp') };
    case 'button voldown':
      return { ok: true, value: command(targetId, 'volumeDown') };
  }

  if (phrase.includes('power')) {
    const state = words[1];
    return state
      ? { ok: true, value: command(targetId, 'power', state) }
      : { ok: true, value: command(targetId, 'powerToggle') };
  }

  if (phrase.includes('mixer volume')) {
    const level = words[2];
    return level
      ? { ok: true, value: command(targetId, 'volumeSet', level) }
      : notSupported('mixer volume without a level');
  }

  return notSupported(`unrecognized phrase "${phrase}"`);
}
