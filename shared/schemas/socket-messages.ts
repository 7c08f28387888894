import { z } from 'zod';
import { SOCKET_MESSAGES } from '../gateway-protocol';

// Every outbound frame on /ws: broadcast envelopes and per-frame replies alike.
export const SocketMessageSchema = z.object({
  message: z.string().min(1),
  message_details: z.unknown(),
});
export type WsSocketMessage = z.infer<typeof SocketMessageSchema>;

export const CommandResultMessageSchema = z.object({
  message: z.literal(SOCKET_MESSAGES.COMMAND_RESULT),
  message_details: z.object({
    player_id: z.string(),
    cmd: z.string(),
    result: z.unknown(),
  }),
});

export const CommandErrorMessageSchema = z.object({
  message: z.literal(SOCKET_MESSAGES.COMMAND_ERROR),
  message_details: z.object({
    error: z.enum([
      'MalformedFrame',
      'CommandNotSupported',
      'UnknownTarget',
      'UnknownCommand',
      'InvocationFailed',
    ]),
    message: z.string(),
    frame: z.string(),
  }),
});

/**
 * Parse a raw frame received from the gateway socket.
 * Returns null for anything that is not a well-formed gateway message.
 */
export function parseSocketMessage(raw: string): WsSocketMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = SocketMessageSchema.safeParse(data);
  return result.success ? result.data : null;
}
