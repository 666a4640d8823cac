/**
 * Controller contract
 *
 * A controller is two streams: commands flowing in from an actor and
 * messages flowing back out to it. How commands are produced and
 * messages consumed is up to the implementation.
 *
 * @module control/controller
 */

import type { Receiver } from './receiver.js';

export type Command = string;
export type Message = string;

export interface Controller {
  /** Receiver currently driven by this controller */
  readonly receiver: Receiver | null;
  /** Remove and return the oldest command. Gate behind hasCmd(). */
  readCmd(): Command;
  /** Resolves once a command is available, or early when `signal` aborts */
  cmdReady(signal?: AbortSignal): Promise<void>;
  writeMsg(message: Message): void;
  hasCmd(): boolean;
  hasMsg(): boolean;
  /** Detach the receiver from its controller, then attach it here */
  assumeControl(receiver: Receiver): void;
  /** Back-reference hook; only Receiver.attach/detach call this */
  bindReceiver(receiver: Receiver | null): void;
}

export abstract class BaseController implements Controller {
  private boundReceiver: Receiver | null = null;

  get receiver(): Receiver | null {
    return this.boundReceiver;
  }

  bindReceiver(receiver: Receiver | null): void {
    this.boundReceiver = receiver;
  }

  assumeControl(receiver: Receiver): void {
    receiver.detach();
    receiver.attach(this);
  }

  abstract readCmd(): Command;
  abstract cmdReady(signal?: AbortSignal): Promise<void>;
  abstract writeMsg(message: Message): void;
  abstract hasCmd(): boolean;
  abstract hasMsg(): boolean;
}

const CONTROLLER_METHODS = [
  'readCmd',
  'cmdReady',
  'writeMsg',
  'hasCmd',
  'hasMsg',
  'assumeControl',
  'bindReceiver',
] as const;

export function isController(value: unknown): value is Controller {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate = value as Record<string, unknown>;
  return CONTROLLER_METHODS.every(method => typeof candidate[method] === 'function');
}

/**
 * Blocking receive: wait until the controller has a command, then read it
 */
export async function receiveCmd(controller: Controller): Promise<Command> {
  while (!controller.hasCmd()) {
    await controller.cmdReady();
  }
  return controller.readCmd();
}
