/**
 * A receiver that listens to one Controller at a time
 *
 * @module control/monoreceiver
 */

import type { Controller } from './controller.js';
import type { Receiver } from './receiver.js';

export abstract class Monoreceiver implements Receiver {
  private current: Controller | null = null;

  get controller(): Controller | null {
    return this.current;
  }

  attach(controller: Controller): void {
    // Already attached. Also ends the assumeControl -> attach recursion.
    if (controller === this.current) {
      return;
    }
    this.detach();
    this.current = controller;
    controller.bindReceiver(this);
  }

  detach(): void {
    const controller = this.current;
    if (controller === null) {
      return;
    }
    controller.bindReceiver(null);
    this.current = null;
  }

  abstract update(): void;

  toString(): string {
    return this.constructor.name;
  }
}
