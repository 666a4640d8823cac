export * from './control/index.js';

export { Character, CommandTable, CHARACTER_COMMANDS } from './entities/character.js';
export type { CommandSpec } from './entities/character.js';
export {
  Sentinel,
  Wanderer,
  SENTINEL_COMMANDS,
  WANDERER_COMMANDS,
  characterKinds,
  createCharacter,
} from './entities/roster.js';
