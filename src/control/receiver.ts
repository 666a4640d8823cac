/**
 * Receiver contract: an entity that a Controller attaches to and updates
 *
 * @module control/receiver
 */

import type { Controller } from './controller.js';

export interface Receiver {
  /** Controller currently driving this receiver */
  readonly controller: Controller | null;
  attach(controller: Controller): void;
  detach(): void;
  /** Called once per tick to consume commands and emit messages */
  update(): void;
}

export function isReceiver(value: unknown): value is Receiver {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate = value as Record<string, unknown>;
  return (
    typeof candidate.attach === 'function' &&
    typeof candidate.detach === 'function' &&
    typeof candidate.update === 'function'
  );
}
