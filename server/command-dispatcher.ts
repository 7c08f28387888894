/**
 * Command Dispatcher
 *
 * Resolves a player, looks the command up in its capability map and invokes
 * it. Every outcome comes back as a `DispatchResult`; nothing a capability
 * does can throw out of `dispatch()`.
 *
 * The resolved target is only held for the duration of one call. Players come
 * and go between requests, so nothing is cached.
 */

import type { Command, DispatchResult } from '@shared/gateway-protocol';
import type { CapabilityTarget } from './capabilities';
import { createLogger, type Logger } from './logger';

/** Resolves a target id to a live entity, or undefined when none exists. */
export interface TargetLookup {
  getPlayer(targetId: string): Promise<CapabilityTarget | undefined>;
}

const dispatchLogger = createLogger('Dispatch');

export class CommandDispatcher {
  constructor(
    private readonly targets: TargetLookup,
    private readonly logger: Logger = dispatchLogger
  ) {}

  async dispatch(targetId: string, commandName: string, argument?: string): Promise<DispatchResult> {
    let target: CapabilityTarget | undefined;
    try {
      target = await this.targets.getPlayer(targetId);
    } catch (error) {
      this.logger.error(`Player lookup failed for ${targetId}`, error);
      return {
        ok: false,
        error: 'UnknownTarget',
        message: `Unable to resolve player ${targetId}`,
        cause: error,
      };
    }

    if (!target) {
      this.logger.error(`Received command for non-existing player ${targetId}`);
      return { ok: false, error: 'UnknownTarget', message: `Unknown player: ${targetId}` };
    }

    const capability = target.capabilities.get(commandName);
    if (!capability) {
      this.logger.error(`Received non-existing command ${commandName} for player ${target.name}`);
      return {
        ok: false,
        error: 'UnknownCommand',
        message: `Player ${target.name} does not support ${commandName}`,
      };
    }

    try {
      const value = capability.takesArgument
        ? await capability.invoke(argument)
        : await capability.invoke();
      return { ok: true, value: value ?? false };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${commandName} failed on player ${target.name}: ${reason}`);
      return { ok: false, error: 'InvocationFailed', message: reason, cause: error };
    }
  }

  dispatchCommand(command: Command): Promise<DispatchResult> {
    return this.dispatch(command.targetId, command.name, command.argument);
  }
}
