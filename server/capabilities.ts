/**
 * Capability Interface
 *
 * A controllable entity exposes an explicit map from command name to a bound
 * operation. The map is built when the entity is constructed; dispatch is a
 * lookup in it, so an unknown name is simply a miss. Every operation takes
 * either no argument or exactly one string argument.
 */

export type CapabilityHandler =
  | { readonly takesArgument: false; invoke(): Promise<unknown> }
  | { readonly takesArgument: true; invoke(argument: string | undefined): Promise<unknown> };

export type CapabilitySet = ReadonlyMap<string, CapabilityHandler>;

/** The handle the dispatcher borrows for one call. */
export interface CapabilityTarget {
  readonly id: string;
  readonly name: string;
  readonly capabilities: CapabilitySet;
}

/** Command names every player exposes. Entities may add more. */
export const PLAYER_COMMANDS = [
  'play',
  'pause',
  'stop',
  'next',
  'previous',
  'power',
  'powerToggle',
  'volumeSet',
  'volumeMute',
  'volumeUp',
  'volumeDown',
] as const;

/** Thrown by an operation that was given an argument it cannot use. */
export class CapabilityArgumentError extends Error {
  readonly capability: string;

  constructor(capability: string, message: string) {
    super(message);
    this.name = 'CapabilityArgumentError';
    this.capability = capability;
  }
}

export function noArgument(operation: () => Promise<unknown>): CapabilityHandler {
  return { takesArgument: false, invoke: () => operation() };
}

export function withArgument(
  operation: (argument: string | undefined) => Promise<unknown>
): CapabilityHandler {
  return { takesArgument: true, invoke: (argument: string | undefined) => operation(argument) };
}

export function defineCapabilities(handlers: Record<string, CapabilityHandler>): CapabilitySet {
  return new Map(Object.entries(handlers));
}

/** Like `withArgument`, for operations that cannot run without one. */
export function requiredArgument(
  capability: string,
  operation: (argument: string) => Promise<unknown>
): CapabilityHandler {
  return withArgument((argument) => {
    if (argument === undefined || argument === '') {
      return Promise.reject(
        new CapabilityArgumentError(capability, `${capability} requires an argument`)
      );
    }
    return operation(argument);
  });
}

const TRUE_WORDS = new Set(['1', 'true', 'on', 'yes']);
const FALSE_WORDS = new Set(['0', 'false', 'off', 'no']);

export function parseBooleanArgument(capability: string, argument: string): boolean {
  const normalized = argument.trim().toLowerCase();
  if (TRUE_WORDS.has(normalized)) return true;
  if (FALSE_WORDS.has(normalized)) return false;
  throw new CapabilityArgumentError(capability, `${capability} expects a boolean, got "${argument}"`);
}

/**
 * Parse a volume argument. Absolute values (`"40"`) replace the current
 * level, signed values (`"+5"`, `"-10"`) adjust it. The result is clamped
 * to 0..100.
 */
export function parseVolumeArgument(capability: string, argument: string, current: number): number {
  const trimmed = argument.trim();
  if (!/^[+-]?\d+(\.\d+)?$/.test(trimmed)) {
    throw new CapabilityArgumentError(capability, `${capability} expects a number, got "${argument}"`);
  }
  const value = Number(trimmed);
  const relative = trimmed.startsWith('+') || trimmed.startsWith('-');
  const level = relative ? current + value : value;
  return Math.round(Math.min(100, Math.max(0, level)));
}
