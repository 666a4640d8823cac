/**
 * MultiController: several controllers acting as one
 *
 * A MultiController is itself a Controller, so it can be built from other
 * MultiControllers; those are flattened into their leaf controllers.
 * Use it when several players drive one character, or a player and an AI
 * fight for control:
 *
 *   const duel = combine(new Player('p1'), new Player('p2'));
 *   duel.assumeControl(new Sentinel('Spirit'));
 *
 * @module control/multicontroller
 */

import { BaseController, isController, type Command, type Controller, type Message } from './controller.js';
import type { Receiver } from './receiver.js';
import { ControlError, ErrorCode } from './protocol.js';

export class MultiController extends BaseController implements Iterable<Controller> {
  private readonly members: Controller[] = [];

  constructor(...controllers: Controller[]) {
    super();
    for (const controller of controllers) {
      if (!isController(controller)) {
        throw new ControlError(ErrorCode.INVALID_CONTROLLER, 'Cannot add non-Controller to MultiController');
      }
      if (controller instanceof MultiController) {
        this.members.push(...controller);
      } else {
        this.members.push(controller);
      }
    }
  }

  [Symbol.iterator](): Iterator<Controller> {
    return this.members[Symbol.iterator]();
  }

  get size(): number {
    return this.members.length;
  }

  /**
   * Binding propagates so that each member's push trigger reaches the
   * shared receiver. A member's own earlier receiver is detached first;
   * clearing leaves members that have since taken on another receiver.
   */
  override bindReceiver(receiver: Receiver | null): void {
    const previous = this.receiver;
    super.bindReceiver(receiver);
    for (const member of this.members) {
      const held = member.receiver;
      if (receiver === null) {
        if (held === previous) {
          member.bindReceiver(null);
        }
        continue;
      }
      if (held !== null && held !== receiver && held.controller === member) {
        held.detach();
      }
      member.bindReceiver(receiver);
    }
  }

  /**
   * Read from the first member that has a command
   */
  readCmd(): Command {
    for (const member of this.members) {
      if (member.hasCmd()) {
        return member.readCmd();
      }
    }
    throw new ControlError(ErrorCode.EMPTY_QUEUE);
  }

  /**
   * Resolves once any member has a command. Waits left on the other
   * members are cancelled when the race settles.
   */
  cmdReady(signal?: AbortSignal): Promise<void> {
    if (this.hasCmd() || signal?.aborted) {
      return Promise.resolve();
    }
    const race = new AbortController();
    const cancel = (): void => race.abort();
    signal?.addEventListener('abort', cancel, { once: true });

    return Promise.race(this.members.map(member => member.cmdReady(race.signal))).finally(() => {
      signal?.removeEventListener('abort', cancel);
      race.abort();
    });
  }

  /**
   * Send a message to every member
   */
  writeMsg(message: Message): void {
    for (const member of this.members) {
      member.writeMsg(message);
    }
  }

  hasMsg(): boolean {
    return this.members.some(member => member.hasMsg());
  }

  hasCmd(): boolean {
    return this.members.some(member => member.hasCmd());
  }
}

export function combine(...controllers: Controller[]): MultiController {
  return new MultiController(...controllers);
}
