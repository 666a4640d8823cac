/**
 * Player: a Controller bound to a client session id
 *
 * @module control/player
 */

import { BaseController, type Command, type Message } from './controller.js';
import { Channel } from './channel.js';
import { getSessionRegistry, type SessionId, type SessionRegistry } from './registry.js';

export class Player extends BaseController {
  private readonly commands = new Channel<Command>();
  private readonly messages = new Channel<Message>();
  // Commands sent while an update pass is running
  private deferred: Command[] = [];
  private updating = false;

  /**
   * Registers the player under `id`. Throws ControlError(DUPLICATE_SESSION)
   * if the id is taken.
   */
  constructor(
    public readonly id: SessionId,
    registry: SessionRegistry = getSessionRegistry()
  ) {
    super();
    registry.register(id, this);
  }

  readCmd(): Command {
    return this.commands.take();
  }

  cmdReady(signal?: AbortSignal): Promise<void> {
    return this.commands.ready(signal);
  }

  writeMsg(message: Message): void {
    this.messages.push(message);
  }

  /**
   * Remove and return the oldest outbound message
   */
  readMsg(): Message {
    return this.messages.take();
  }

  hasCmd(): boolean {
    return !this.commands.isEmpty();
  }

  hasMsg(): boolean {
    return !this.messages.isEmpty();
  }

  /**
   * Queue a command and run one update pass of the receiver.
   * During a pass the command is held back for the follow-up pass.
   */
  send(command: Command): void {
    if (this.updating) {
      this.deferred.push(command);
      return;
    }
    this.flushDeferred();
    this.commands.push(command);
    this.poke();
  }

  /**
   * Run update passes until no deferred commands remain.
   * Without a receiver, commands stay queued.
   */
  poke(): void {
    if (this.updating) {
      return;
    }
    this.flushDeferred();
    const receiver = this.receiver;
    if (!receiver) {
      return;
    }

    this.updating = true;
    try {
      receiver.update();
    } finally {
      this.updating = false;
    }

    if (this.deferred.length > 0) {
      this.poke();
    }
  }

  private flushDeferred(): void {
    const pending = this.deferred;
    this.deferred = [];
    for (const command of pending) {
      this.commands.push(command);
    }
  }

  toString(): string {
    return `id: ${this.id} receiver: ${this.receiver === null ? 'none' : String(this.receiver)}`;
  }
}
