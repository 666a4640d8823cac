/**
 * Session Registry
 *
 * Maps stable session ids to their Player controllers:
 * - Registration on connect, rejecting ids already in use
 * - Push-triggered command delivery
 * - Draining outbound messages of every session
 * - Removal on disconnect, detaching the driven receiver
 *
 * Events: `playerRegistered` (id, player), `commandReceived` (id, command),
 * `playerRemoved` (id, player).
 *
 * @module control/registry
 */

import { EventEmitter } from 'events';
import type { Command, Message } from './controller.js';
import type { Player } from './player.js';
import { DEFAULT_REGISTRY_CONFIG, RegistryConfigSchema, resolveConfig, type RegistryConfig } from './config.js';
import { ControlError, ErrorCode } from './protocol.js';

export type SessionId = string;

export class SessionRegistry extends EventEmitter {
  private readonly players: Map<SessionId, Player> = new Map();
  private readonly config: RegistryConfig;

  constructor(config?: Partial<RegistryConfig>) {
    super();
    this.config = resolveConfig(RegistryConfigSchema, DEFAULT_REGISTRY_CONFIG, config);
  }

  get size(): number {
    return this.players.size;
  }

  /**
   * Register a player under its session id. Called by the Player constructor.
   */
  register(id: SessionId, player: Player): void {
    if (this.players.has(id)) {
      throw new ControlError(ErrorCode.DUPLICATE_SESSION, `ID already taken: ${id}`);
    }
    this.players.set(id, player);

    if (this.config.verbose) {
      console.log(`[Registry] Player connected: ${id} (total: ${this.players.size})`);
    }
    this.emit('playerRegistered', id, player);
  }

  has(id: SessionId): boolean {
    return this.players.has(id);
  }

  /**
   * Look up a player. Throws ControlError(UNKNOWN_SESSION) when absent.
   */
  get(id: SessionId): Player {
    const player = this.players.get(id);
    if (!player) {
      throw new ControlError(ErrorCode.UNKNOWN_SESSION, `Unknown session ID: ${id}`);
    }
    return player;
  }

  ids(): SessionId[] {
    return Array.from(this.players.keys());
  }

  /**
   * Queue a command for a session and run its receiver's update pass
   * before returning.
   */
  sendCommand(id: SessionId, command: Command): void {
    const player = this.get(id);
    this.emit('commandReceived', id, command);
    player.send(command);
  }

  /**
   * Yield every pending message of every player, in registration order.
   * Each call drains what is queued at the time it is iterated.
   */
  *receiveMessages(): Generator<[SessionId, Message]> {
    for (const [id, player] of this.players) {
      while (player.hasMsg()) {
        yield [id, player.readMsg()];
      }
    }
  }

  /**
   * Remove a player after disconnect, detaching whatever it drives
   */
  removePlayer(id: SessionId): void {
    const player = this.get(id);
    player.receiver?.detach();
    this.players.delete(id);

    if (this.config.verbose) {
      console.log(`[Registry] Player removed: ${id} (total: ${this.players.size})`);
    }
    this.emit('playerRemoved', id, player);
  }

  /**
   * Remove every player
   */
  clear(): void {
    for (const id of this.ids()) {
      this.removePlayer(id);
    }
  }
}

let defaultRegistry: SessionRegistry | null = null;

/**
 * Get the process-wide registry, creating it on first use
 */
export function getSessionRegistry(config?: Partial<RegistryConfig>): SessionRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new SessionRegistry(config);
  }
  return defaultRegistry;
}

/**
 * Drop the process-wide registry (for testing)
 */
export function resetSessionRegistry(): void {
  if (defaultRegistry) {
    defaultRegistry.clear();
    defaultRegistry.removeAllListeners();
  }
  defaultRegistry = null;
}
