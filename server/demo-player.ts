/**
 * In-memory player used when the gateway runs without a real player
 * backend (demo mode, tests). Publishes `player changed` / `queue updated`
 * envelopes through the listener registry on every state change.
 */

import { randomUUID } from 'crypto';
import type { EventEnvelope } from '@shared/gateway-protocol';
import type {
  MediaItem,
  PlayerState,
  PlayerSummary,
  QueueItem,
  QueueOption,
} from '@shared/player-types';
import {
  defineCapabilities,
  noArgument,
  parseBooleanArgument,
  parseVolumeArgument,
  requiredArgument,
  type CapabilitySet,
} from './capabilities';
import type { Player } from './player-registry';

export type EventPublisher = (envelope: EventEnvelope) => void;

export const PLAYER_EVENTS = {
  PLAYER_CHANGED: 'player changed',
  QUEUE_UPDATED: 'queue updated',
} as const;

export interface DemoPlayerOptions {
  powered?: boolean;
  volumeLevel?: number;
  /** Volume change applied by volumeUp / volumeDown. */
  volumeStep?: number;
}

export class EmptyQueueError extends Error {
  constructor(playerName: string) {
    super(`Nothing to play on ${playerName}: queue is empty`);
    this.name = 'EmptyQueueError';
  }
}

export class DemoPlayer implements Player {
  readonly capabilities: CapabilitySet;

  private powered: boolean;
  private state: PlayerState;
  private volumeLevel: number;
  private muted = false;
  private queue: QueueItem[] = [];
  private queueIndex = 0;
  private readonly volumeStep: number;

  constructor(
    readonly id: string,
    readonly name: string,
    private readonly publish: EventPublisher,
    options: DemoPlayerOptions = {}
  ) {
    this.powered = options.powered ?? false;
    this.state = this.powered ? 'stopped' : 'off';
    this.volumeLevel = options.volumeLevel ?? 50;
    this.volumeStep = options.volumeStep ?? 5;

    this.capabilities = defineCapabilities({
      play: noArgument(() => this.play()),
      pause: noArgument(() => this.pause()),
      stop: noArgument(() => this.stop()),
      next: noArgument(() => this.skip(1)),
      previous: noArgument(() => this.skip(-1)),
      power: requiredArgument('power', async (argument) =>
        this.setPower(parseBooleanArgument('power', argument))
      ),
      powerToggle: noArgument(() => this.setPower(!this.powered)),
      volumeSet: requiredArgument('volumeSet', async (argument) =>
        this.setVolume(parseVolumeArgument('volumeSet', argument, this.volumeLevel))
      ),
      volumeMute: requiredArgument('volumeMute', async (argument) =>
        this.setMuted(parseBooleanArgument('volumeMute', argument))
      ),
      volumeUp: noArgument(() => this.setVolume(Math.min(100, this.volumeLevel + this.volumeStep))),
      volumeDown: noArgument(() => this.setVolume(Math.max(0, this.volumeLevel - this.volumeStep))),
    });
  }

  summary(): PlayerSummary {
    return {
      player_id: this.id,
      name: this.name,
      state: this.state,
      powered: this.powered,
      volume_level: this.volumeLevel,
      muted: this.muted,
      cur_queue_index: this.queueIndex,
    };
  }

  queueItems(): readonly QueueItem[] {
    return this.queue;
  }

  async playMedia(items: readonly MediaItem[], option: QueueOption): Promise<boolean> {
    const queued = items.map((item) => this.toQueueItem(item));
    const insertAt = this.queue.length === 0 ? 0 : this.queueIndex + 1;

    switch (option) {
      case 'replace':
        this.queue = queued;
        this.queueIndex = 0;
        break;
      case 'play':
        this.queue.splice(insertAt, 0, ...queued);
        this.queueIndex = insertAt;
        break;
      case 'next':
        this.queue.splice(insertAt, 0, ...queued);
        break;
      case 'add':
        this.queue.push(...queued);
        break;
    }
    this.publish({
      message: PLAYER_EVENTS.QUEUE_UPDATED,
      details: { player_id: this.id, items: this.queue.length },
    });

    if (option === 'play' || option === 'replace') {
      await this.play();
    }
    return true;
  }

  private async play(): Promise<void> {
    if (this.queue.length === 0) {
      throw new EmptyQueueError(this.name);
    }
    this.powered = true;
    this.update({ state: 'playing' });
  }

  private async pause(): Promise<void> {
    if (this.state === 'playing') {
      this.update({ state: 'paused' });
    }
  }

  private async stop(): Promise<void> {
    if (this.powered) {
      this.update({ state: 'stopped' });
    }
  }

  private async skip(delta: number): Promise<void> {
    if (this.queue.length === 0) return;
    const index = Math.min(this.queue.length - 1, Math.max(0, this.queueIndex + delta));
    if (index !== this.queueIndex) {
      this.queueIndex = index;
      this.update({});
    }
  }

  private async setPower(powered: boolean): Promise<void> {
    this.powered = powered;
    this.update({ state: powered ? 'stopped' : 'off' });
  }

  private async setVolume(level: number): Promise<void> {
    this.volumeLevel = level;
    this.update({});
  }

  private async setMuted(muted: boolean): Promise<void> {
    this.muted = muted;
    this.update({});
  }

  private update(change: { state?: PlayerState }): void {
    if (change.state) {
      this.state = change.state;
    }
    this.publish({ message: PLAYER_EVENTS.PLAYER_CHANGED, details: this.summary() });
  }

  private toQueueItem(item: MediaItem): QueueItem {
    return {
      queue_item_id: randomUUID(),
      item_id: item.item_id,
      name: item.name,
      media_type: item.media_type,
      duration: item.duration ?? 0,
    };
  }
}
