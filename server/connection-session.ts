/**
 * Connection Session
 *
 * Lifecycle of one /ws connection:
 *
 *   connecting --run()--> open --close()/fail()--> closing --> closed
 *
 * `run()` holds the listener subscription for exactly as long as the session
 * is open: it registers on entry and unregisters in a `finally`, so the
 * subscription is released whichever way the session ends (peer close,
 * transport error, server shutdown).
 *
 * Inbound text frames are handled one at a time in arrival order. Broadcast
 * envelopes are forwarded straight to the transport and never wait for an
 * in-flight dispatch.
 */

import type { RawData } from 'ws';
import {
  SOCKET_MESSAGES,
  type CommandErrorDetails,
  type CommandResultDetails,
  type EventEnvelope,
  type SocketMessage,
} from '@shared/gateway-protocol';
import type { CommandDispatcher } from './command-dispatcher';
import { parseSocketFrame } from './command-normalizer';
import type { ListenerRegistry, SubscriberId } from './listener-registry';
import { createLogger, type Logger } from './logger';
import { listPlayersByName, type PlayerRegistry } from './player-registry';

export type SessionState = 'connecting' | 'open' | 'closing' | 'closed';

/** Outbound side of the connection. Resolves once the frame is written. */
export interface SessionTransport {
  send(text: string): Promise<void>;
}

export interface SessionServices {
  registry: ListenerRegistry;
  dispatcher: CommandDispatcher;
  players: PlayerRegistry;
  logger?: Logger;
}

export interface SessionEnd {
  reason: string;
  error?: unknown;
}

const sessionLogger = createLogger('Session');

export function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class ConnectionSession {
  private state: SessionState = 'connecting';
  private subscriberId: SubscriberId | null = null;
  private inbound: Promise<void> = Promise.resolve();
  private end: ((end: SessionEnd) => void) | null = null;
  private readonly ended = new Promise<SessionEnd>((resolve) => {
    this.end = resolve;
  });
  private readonly logger: Logger;

  constructor(
    private readonly transport: SessionTransport,
    private readonly services: SessionServices,
    readonly label = 'client'
  ) {
    this.logger = services.logger ?? sessionLogger;
  }

  get currentState(): SessionState {
    return this.state;
  }

  /** The live subscription id while open, null otherwise. */
  get subscription(): SubscriberId | null {
    return this.subscriberId;
  }

  /**
   * Open the session and keep it open until `close()` or `fail()`.
   * Resolves with the reason the session ended, after the subscription has
   * been released.
   */
  async run(): Promise<SessionEnd> {
    if (this.state !== 'connecting') {
      return { reason: `session already ${this.state}` };
    }

    const { registry } = this.services;
    const id = registry.register((envelope) => this.forward(envelope));
    this.subscriberId = id;
    this.state = 'open';
    this.logger.debug(`${this.label} open as listener ${id}`);

    try {
      return await this.ended;
    } finally {
      this.state = 'closing';
      registry.unregister(id);
      this.subscriberId = null;
      this.state = 'closed';
      this.logger.debug(`${this.label} closed, listener ${id} removed`);
    }
  }

  /** Peer disconnect or server shutdown. Safe to call more than once. */
  close(reason = 'closed'): void {
    this.finish({ reason });
  }

  /** Transport failure. Safe to call more than once. */
  fail(error: unknown): void {
    this.finish({ reason: 'transport error', error });
  }

  /**
   * Queue one inbound frame. Binary frames and frames received after the
   * session left the open state are ignored.
   */
  receive(data: RawData, isBinary: boolean): void {
    if (this.state !== 'open') return;
    if (isBinary) {
      this.logger.debug(`${this.label} sent a binary frame, ignoring`);
      return;
    }
    const frame = rawDataToText(data);
    this.inbound = this.inbound.then(() => this.handleFrame(frame));
  }

  /** Resolves once every frame received so far has been handled. */
  idle(): Promise<void> {
    return this.inbound;
  }

  /** Listener sink: re-tag the envelope and write it to the peer. */
  forward(envelope: EventEnvelope): Promise<void> {
    if (this.state !== 'open') return Promise.resolve();
    const message: SocketMessage = {
      message: envelope.message,
      message_details: envelope.details,
    };
    return this.transport.send(JSON.stringify(message));
  }

  private finish(end: SessionEnd): void {
    if (this.state === 'closing' || this.state === 'closed') return;
    if (this.state === 'connecting') {
      // run() never started, so there is nothing to release
      this.state = 'closed';
      return;
    }
    this.state = 'closing';
    this.end?.(end);
    this.end = null;
  }

  private async handleFrame(frame: string): Promise<void> {
    if (this.state !== 'open') return;

    try {
      const parsed = parseSocketFrame(frame);
      if (!parsed.ok) {
        await this.replyError({ error: parsed.error, message: parsed.reason, frame });
        return;
      }

      if (parsed.value.type === 'list-players') {
        const players = await listPlayersByName(this.services.players);
        await this.reply({ message: SOCKET_MESSAGES.PLAYERS, message_details: players });
        return;
      }

      const { command } = parsed.value;
      const result = await this.services.dispatcher.dispatchCommand(command);
      if (result.ok) {
        const details: CommandResultDetails = {
          player_id: command.targetId,
          cmd: command.name,
          result: result.value,
        };
        await this.reply({ message: SOCKET_MESSAGES.COMMAND_RESULT, message_details: details });
      } else {
        await this.replyError({ error: result.error, message: result.message, frame });
      }
    } catch (error) {
      this.logger.error(`${this.label} failed to handle frame "${frame}"`, error);
    }
  }

  private replyError(details: CommandErrorDetails): Promise<void> {
    return this.reply({ message: SOCKET_MESSAGES.COMMAND_ERROR, message_details: details });
  }

  private async reply(message: SocketMessage): Promise<void> {
    if (this.state !== 'open') return;
    try {
      await this.transport.send(JSON.stringify(message));
    } catch (error) {
      this.logger.warn(`${this.label} write failed, closing session`);
      this.fail(error);
    }
  }
}
