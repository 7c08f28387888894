import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { EventEnvelope } from '@shared/gateway-protocol';
import { defineCapabilities, noArgument, type CapabilityTarget } from '../capabilities';
import { CommandDispatcher } from '../command-dispatcher';
import { ConnectionSession, rawDataToText, type SessionServices } from '../connection-session';
import { DemoPlayer } from '../demo-player';
import { ListenerRegistry } from '../listener-registry';
import type { Logger } from '../logger';
import { MemPlayerRegistry } from '../player-registry';

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function frame(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

describe('ConnectionSession', () => {
  let sent: string[];
  let send: Mock<(text: string) => Promise<void>>;
  let registry: ListenerRegistry;
  let services: SessionServices;

  beforeEach(() => {
    sent = [];
    send = vi.fn(async (text: string) => {
      sent.push(text);
    });
    const logger = silentLogger();
    registry = new ListenerRegistry({ logger });
    const players = new MemPlayerRegistry([
      new DemoPlayer('study', 'Study', vi.fn()),
      new DemoPlayer('kitchen', 'Kitchen', vi.fn()),
    ]);
    services = {
      registry,
      players,
      dispatcher: new CommandDispatcher(players, logger),
      logger,
    };
  });

  const replies = () => sent.map((text): unknown => JSON.parse(text));

  describe('lifecycle', () => {
    it('subscribes while open and unsubscribes on close', async () => {
      const session = new ConnectionSession({ send }, services);
      expect(session.currentState).toBe('connecting');

      const running = session.run();
      expect(session.currentState).toBe('open');
      const id = session.subscription;
      expect(id).not.toBeNull();
      expect(registry.size).toBe(1);

      session.close('peer disconnected');

      await expect(running).resolves.toEqual({ reason: 'peer disconnected' });
      expect(session.currentState).toBe('closed');
      expect(session.subscription).toBeNull();
      expect(registry.size).toBe(0);
    });

    it('unsubscribes when the transport fails', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();
      const error = new Error('connection reset');

      session.fail(error);

      await expect(running).resolves.toEqual({ reason: 'transport error', error });
      expect(registry.size).toBe(0);
    });

    it('ignores repeated close and fail calls', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      session.close('first');
      session.close('second');
      session.fail(new Error('late'));

      await expect(running).resolves.toEqual({ reason: 'first' });
      expect(registry.size).toBe(0);
    });

    it('never subscribes when closed before it opened', async () => {
      const session = new ConnectionSession({ send }, services);
      session.close();

      await expect(session.run()).resolves.toEqual({ reason: 'session already closed' });
      expect(registry.size).toBe(0);
    });

    it('runs only once', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      await expect(session.run()).resolves.toEqual({ reason: 'session already open' });
      expect(registry.size).toBe(1);

      session.close();
      await running;
    });
  });

  describe('broadcast forwarding', () => {
    const envelope: EventEnvelope = {
      message: 'player changed',
      details: { player_id: 'kitchen', volume_level: 30 },
    };

    it('re-tags envelopes for the peer', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      await registry.broadcast(envelope);

      expect(sent).toEqual([
        JSON.stringify({
          message: 'player changed',
          message_details: { player_id: 'kitchen', volume_level: 30 },
        }),
      ]);
      session.close();
      await running;
    });

    it('stops forwarding once closed', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();
      session.close();
      await running;

      const report = await registry.broadcast(envelope);

      expect(report.delivered).toBe(0);
      expect(send).not.toHaveBeenCalled();
    });

    it('does not forward from a session that was closed but not yet released', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      session.close();
      await session.forward(envelope);

      expect(send).not.toHaveBeenCalled();
      await running;
    });

    it('reaches only the sessions open at broadcast time while others open and close', async () => {
      const peers = new Map<string, string[]>();
      const open = (label: string) => {
        const received: string[] = [];
        peers.set(label, received);
        const session = new ConnectionSession(
          {
            send: async (text: string) => {
              received.push(text);
            },
          },
          services,
          label
        );
        return { session, running: session.run() };
      };

      const a = open('a');
      const b = open('b');
      const c = open('c');
      const d = open('d');
      const e = open('e');

      // a and b finish closing, c is still closing when the broadcast starts
      a.session.close();
      b.session.close();
      await Promise.all([a.running, b.running]);
      c.session.close();
      const f = open('f');
      const g = open('g');

      const broadcasting = registry.broadcast(envelope);
      d.session.close();
      const report = await broadcasting;

      // c is subscribed but closing; d was handed the envelope before it closed
      expect(report).toEqual({ delivered: 5, failed: [] });
      const reached = Array.from(peers.entries())
        .filter(([, received]) => received.length > 0)
        .map(([label]) => label);
      expect(reached).toEqual(['d', 'e', 'f', 'g']);
      expect(peers.get('e')).toEqual([
        JSON.stringify({
          message: 'player changed',
          message_details: { player_id: 'kitchen', volume_level: 30 },
        }),
      ]);

      await Promise.all([c.running, d.running]);
      expect(registry.size).toBe(3);
      e.session.close();
      f.session.close();
      g.session.close();
      await Promise.all([e.running, f.running, g.running]);
      expect(registry.size).toBe(0);
    });
  });

  describe('inbound frames', () => {
    it('answers the player listing request', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      session.receive(frame('players'), false);
      await session.idle();

      expect(replies()).toEqual([
        {
          message: 'players',
          message_details: [
            {
              player_id: 'kitchen',
              name: 'Kitchen',
              state: 'off',
              powered: false,
              volume_level: 50,
              muted: false,
              cur_queue_index: 0,
            },
            {
              player_id: 'study',
              name: 'Study',
              state: 'off',
              powered: false,
              volume_level: 50,
              muted: false,
              cur_queue_index: 0,
            },
          ],
        },
      ]);
      session.close();
      await running;
    });

    it('answers a command with its result', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      session.receive(frame('players/kitchen/cmd/volumeSet/30'), false);
      await session.idle();

      expect(replies()).toEqual([
        {
          message: 'command_result',
          message_details: { player_id: 'kitchen', cmd: 'volumeSet', result: false },
        },
      ]);
      const kitchen = await services.players.getPlayer('kitchen');
      expect(kitchen?.summary().volume_level).toBe(30);
      session.close();
      await running;
    });

    it('answers malformed frames and dispatch failures with command_error', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      session.receive(frame('hello'), false);
      session.receive(frame('players/garage/cmd/play'), false);
      session.receive(frame('players/kitchen/cmd/shuffle'), false);
      await session.idle();

      expect(replies()).toEqual([
        {
          message: 'command_error',
          message_details: {
            error: 'MalformedFrame',
            message: 'expected players/{id}/cmd/{command}, got 1 token(s)',
            frame: 'hello',
          },
        },
        {
          message: 'command_error',
          message_details: {
            error: 'UnknownTarget',
            message: 'Unknown player: garage',
            frame: 'players/garage/cmd/play',
          },
        },
        {
          message: 'command_error',
          message_details: {
            error: 'UnknownCommand',
            message: 'Player Kitchen does not support shuffle',
            frame: 'players/kitchen/cmd/shuffle',
          },
        },
      ]);
      expect(session.currentState).toBe('open');
      session.close();
      await running;
    });

    it('handles frames one at a time in arrival order', async () => {
      const events: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const slow = vi.fn(async () => {
        events.push('slow:start');
        await gate;
        events.push('slow:end');
        return 'slow';
      });
      const fast = vi.fn(async () => {
        events.push('fast');
        return 'fast';
      });
      const target: CapabilityTarget = {
        id: 'p1',
        name: 'Probe',
        capabilities: defineCapabilities({ slow: noArgument(slow), fast: noArgument(fast) }),
      };
      const dispatcher = new CommandDispatcher(
        { getPlayer: async (id: string) => (id === 'p1' ? target : undefined) },
        silentLogger()
      );
      const session = new ConnectionSession({ send }, { ...services, dispatcher });
      const running = session.run();

      session.receive(frame('players/p1/cmd/slow'), false);
      session.receive(frame('players/p1/cmd/fast'), false);
      await vi.waitFor(() => expect(slow).toHaveBeenCalled());
      expect(fast).not.toHaveBeenCalled();

      release();
      await session.idle();

      expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
      expect(replies()).toEqual([
        { message: 'command_result', message_details: { player_id: 'p1', cmd: 'slow', result: 'slow' } },
        { message: 'command_result', message_details: { player_id: 'p1', cmd: 'fast', result: 'fast' } },
      ]);
      session.close();
      await running;
    });

    it('ignores binary frames', async () => {
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      session.receive(frame('players'), true);
      await session.idle();

      expect(send).not.toHaveBeenCalled();
      session.close();
      await running;
    });

    it('ignores frames before the session opened', async () => {
      const session = new ConnectionSession({ send }, services);

      session.receive(frame('players'), false);
      await session.idle();

      expect(send).not.toHaveBeenCalled();
    });

    it('closes the session when a reply cannot be written', async () => {
      const error = new Error('socket is not open');
      send.mockRejectedValueOnce(error);
      const session = new ConnectionSession({ send }, services);
      const running = session.run();

      session.receive(frame('players'), false);

      await expect(running).resolves.toEqual({ reason: 'transport error', error });
      expect(registry.size).toBe(0);
    });
  });
});

describe('rawDataToText', () => {
  it('decodes buffers, fragment lists and array buffers', () => {
    expect(rawDataToText(Buffer.from('players'))).toBe('players');
    expect(rawDataToText([Buffer.from('play'), Buffer.from('ers')])).toBe('players');
    const arrayBuffer = new ArrayBuffer(7);
    new Uint8Array(arrayBuffer).set(Buffer.from('players'));
    expect(rawDataToText(arrayBuffer)).toBe('players');
  });
});
