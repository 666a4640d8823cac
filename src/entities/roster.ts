/**
 * Playable character classes
 *
 * @module entities/roster
 */

import { Character, CHARACTER_COMMANDS, type CommandTable } from './character.js';
import { ControlError, ErrorCode } from '../control/protocol.js';

export const SENTINEL_COMMANDS = CHARACTER_COMMANDS.extend('Sentinel', {
  report: {
    help: 'Report on the watch.\nusage: report',
    run: character => {
      character.message('All quiet.');
    },
  },
});

export const WANDERER_COMMANDS = CHARACTER_COMMANDS.extend('Wanderer', {
  wave: {
    help: 'Wave at whoever is watching.\nusage: wave',
    run: character => {
      character.message(`${String(character)} waves.`);
    },
  },
});

export class Sentinel extends Character {
  override readonly commands: CommandTable = SENTINEL_COMMANDS;
}

export class Wanderer extends Character {
  override readonly commands: CommandTable = WANDERER_COMMANDS;
}

const ROSTER = new Map<string, new (name: string) => Character>([
  ['Character', Character],
  ['Sentinel', Sentinel],
  ['Wanderer', Wanderer],
]);

export function characterKinds(): string[] {
  return Array.from(ROSTER.keys());
}

/**
 * Build a character by class name. Throws ControlError(INVALID_CONFIG)
 * for a kind not on the roster.
 */
export function createCharacter(kind: string, name: string): Character {
  const create = ROSTER.get(kind);
  if (!create) {
    throw new ControlError(
      ErrorCode.INVALID_CONFIG,
      `Unknown character kind: ${kind} (expected one of ${characterKinds().join(', ')})`
    );
  }
  return new create(name);
}
