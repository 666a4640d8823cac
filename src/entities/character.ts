/**
 * Character base class and command tables
 *
 * A character is a Monoreceiver that reads text commands from its
 * controller and answers with messages. Commands come from a
 * CommandTable built once per class; each table extends its base
 * class's table, so the help menu lists base commands first.
 *
 * @module entities/character
 */

import { Monoreceiver } from '../control/monoreceiver.js';
import type { Message } from '../control/controller.js';
import { ControlError, ErrorCode } from '../control/protocol.js';

/**
 * A user command
 */
export interface CommandSpec {
  /** Help text shown by `help <command>` */
  readonly help: string;
  readonly run: (character: Character, args: string) => void;
}

export class CommandTable {
  private readonly handlers: ReadonlyMap<string, CommandSpec>;
  /** Commands not found in the base table */
  readonly unique: readonly string[];
  /** Preformatted menu printed by `help` */
  readonly helpMenu: string;

  constructor(
    readonly title: string,
    commands: Record<string, CommandSpec>,
    base?: CommandTable
  ) {
    const handlers = new Map<string, CommandSpec>(base ? base.entries() : []);
    const unique: string[] = [];
    for (const [name, spec] of Object.entries(commands)) {
      if (!base?.has(name)) {
        unique.push(name);
      }
      handlers.set(name, spec);
    }

    this.handlers = handlers;
    this.unique = unique;
    this.helpMenu = `${base?.helpMenu ?? ''}[${title} Commands]\n${unique.join('\t')}\n`;
  }

  extend(title: string, commands: Record<string, CommandSpec>): CommandTable {
    return new CommandTable(title, commands, this);
  }

  get(name: string): CommandSpec | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  names(): string[] {
    return Array.from(this.handlers.keys());
  }

  entries(): IterableIterator<[string, CommandSpec]> {
    return this.handlers.entries();
  }
}

function unrecognized(command: string): ControlError {
  return new ControlError(ErrorCode.UNKNOWN_COMMAND, `Command '${command}' not recognized.`);
}

export const CHARACTER_COMMANDS = new CommandTable('Character', {
  help: {
    help: 'Show help for a command.\nusage: help [command]\nWithout a command, all commands are listed.',
    run: (character, args) => {
      if (args === '') {
        character.message(character.commands.helpMenu);
        return;
      }
      const command = args.split(' ')[0] ?? '';
      const spec = character.commands.get(command);
      if (!spec) {
        throw unrecognized(command);
      }
      character.message(spec.help);
    },
  },
  say: {
    help: 'Say a message aloud.\nusage: say [message]',
    run: (character, args) => {
      character.message(`${String(character)} : ${args}`);
    },
  },
});

export class Character extends Monoreceiver {
  readonly commands: CommandTable = CHARACTER_COMMANDS;

  constructor(readonly name: string) {
    super();
  }

  /**
   * Send a message to this character's controller
   */
  message(message: Message): void {
    this.controller?.writeMsg(message);
  }

  /**
   * Drain the controller's commands. A failing command is reported to the
   * controller and the next one still runs.
   */
  update(): void {
    let controller = this.controller;
    while (controller !== null && controller.hasCmd()) {
      const line = controller.readCmd();
      if (line.trim() !== '') {
        try {
          this.execute(line);
        } catch (err) {
          this.message(err instanceof Error ? err.message : String(err));
        }
      }
      controller = this.controller;
    }
  }

  /**
   * Run one command line. Throws ControlError(UNKNOWN_COMMAND) for a
   * command missing from the table.
   */
  execute(line: string): void {
    const trimmed = line.trim();
    const command = trimmed.split(' ')[0] ?? '';
    const args = trimmed.slice(command.length).trim();
    const spec = this.commands.get(command);
    if (!spec) {
      throw unrecognized(command);
    }
    spec.run(this, args);
  }

  override toString(): string {
    return `${this.name} the ${this.commands.title}`;
  }
}
