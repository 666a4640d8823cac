/**
 * Player & Session Registry Tests
 *
 * - Registration and duplicate ids
 * - Push-triggered updates and deferred commands
 * - Draining messages across sessions
 * - Removal on disconnect
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Player } from '../src/control/player.js';
import { Monoreceiver } from '../src/control/monoreceiver.js';
import { SessionRegistry, getSessionRegistry, resetSessionRegistry } from '../src/control/registry.js';
import { ControlError, ErrorCode } from '../src/control/protocol.js';
import { Sentinel } from '../src/entities/roster.js';
import { ScriptedReceiver, catchError, readAll } from './helpers/receivers.js';

describe('SessionRegistry', () => {
  let registry: SessionRegistry;

  beforeEach(() => {
    registry = new SessionRegistry();
  });

  describe('Registration', () => {
    it('should register a player on construction', () => {
      const player = new Player('a', registry);

      expect(registry.has('a')).toBe(true);
      expect(registry.get('a')).toBe(player);
      expect(registry.size).toBe(1);
    });

    it('should reject a duplicate session id and keep the original', () => {
      const original = new Player('a', registry);

      const error = catchError(() => new Player('a', registry));

      expect(error).toBeInstanceOf(ControlError);
      expect(error).toMatchObject({ code: ErrorCode.DUPLICATE_SESSION, message: 'ID already taken: a' });
      expect(registry.get('a')).toBe(original);
      expect(registry.size).toBe(1);
    });

    it('should emit playerRegistered', () => {
      const listener = vi.fn();
      registry.on('playerRegistered', listener);

      const player = new Player('a', registry);

      expect(listener).toHaveBeenCalledWith('a', player);
    });

    it('should list ids in registration order', () => {
      new Player('b', registry);
      new Player('a', registry);
      expect(registry.ids()).toEqual(['b', 'a']);
    });
  });

  describe('sendCommand', () => {
    it('should run the receiver update before returning', () => {
      const player = new Player('a', registry);
      const receiver = new ScriptedReceiver('Ada');
      player.assumeControl(receiver);

      registry.sendCommand('a', 'look');

      expect(receiver.received).toEqual(['look']);
      expect(player.hasCmd()).toBe(false);
    });

    it('should fail for an unknown id and leave queues unchanged', () => {
      const player = new Player('a', registry);

      const error = catchError(() => registry.sendCommand('ghost', 'look'));

      expect(error).toBeInstanceOf(ControlError);
      expect(error).toMatchObject({ code: ErrorCode.UNKNOWN_SESSION, message: 'Unknown session ID: ghost' });
      expect(player.hasCmd()).toBe(false);
      expect(player.hasMsg()).toBe(false);
    });

    it('should keep commands queued while no receiver is attached', () => {
      const player = new Player('a', registry);

      registry.sendCommand('a', 'look');

      expect(player.hasCmd()).toBe(true);
      expect(player.readCmd()).toBe('look');
    });

    it('should process commands queued before a trigger in FIFO order', () => {
      const player = new Player('a', registry);
      registry.sendCommand('a', 'report');
      registry.sendCommand('a', 'dance');
      registry.sendCommand('a', 'say hi');
      registry.sendCommand('a', 'fly');

      new Sentinel('Ada').attach(player);
      player.poke();

      expect(readAll(player)).toEqual([
        'All quiet.',
        "Command 'dance' not recognized.",
        'Ada the Sentinel : hi',
        "Command 'fly' not recognized.",
      ]);
    });

    it('should defer commands sent during a pass to a follow-up pass', () => {
      const player = new Player('a', registry);

      class Echo extends Monoreceiver {
        readonly passes: string[][] = [];

        update(): void {
          const batch: string[] = [];
          const controller = this.controller;
          while (controller !== null && controller.hasCmd()) {
            const command = controller.readCmd();
            batch.push(command);
            if (command === 'ping') {
              registry.sendCommand('a', 'pong');
            }
          }
          this.passes.push(batch);
        }
      }

      const echo = new Echo();
      player.assumeControl(echo);
      registry.sendCommand('a', 'ping');

      expect(echo.passes).toEqual([['ping'], ['pong']]);
      expect(player.hasCmd()).toBe(false);
    });

    it('should emit commandReceived', () => {
      new Player('a', registry);
      const listener = vi.fn();
      registry.on('commandReceived', listener);

      registry.sendCommand('a', 'look');

      expect(listener).toHaveBeenCalledWith('a', 'look');
    });
  });

  describe('receiveMessages', () => {
    it('should drain every player in registration order', () => {
      const a = new Player('a', registry);
      const b = new Player('b', registry);
      b.writeMsg('b1');
      a.writeMsg('a1');
      a.writeMsg('a2');

      expect(Array.from(registry.receiveMessages())).toEqual([
        ['a', 'a1'],
        ['a', 'a2'],
        ['b', 'b1'],
      ]);
      expect(Array.from(registry.receiveMessages())).toEqual([]);
    });

    it('should take messages lazily', () => {
      const a = new Player('a', registry);
      a.writeMsg('a1');
      a.writeMsg('a2');

      const messages = registry.receiveMessages();
      expect(messages.next().value).toEqual(['a', 'a1']);
      expect(a.hasMsg()).toBe(true);
      expect(messages.next().value).toEqual(['a', 'a2']);
      expect(messages.next().done).toBe(true);
    });
  });

  describe('removePlayer', () => {
    it('should detach the receiver and drop the session', () => {
      const player = new Player('a', registry);
      const sentinel = new Sentinel('Ada');
      player.assumeControl(sentinel);

      registry.removePlayer('a');

      expect(sentinel.controller).toBeNull();
      expect(player.receiver).toBeNull();
      expect(registry.has('a')).toBe(false);
    });

    it('should remove a player without a receiver', () => {
      new Player('a', registry);
      registry.removePlayer('a');
      expect(registry.size).toBe(0);
    });

    it('should fail on the second removal', () => {
      new Player('a', registry);
      registry.removePlayer('a');

      const error = catchError(() => registry.removePlayer('a'));
      expect(error).toMatchObject({ code: ErrorCode.UNKNOWN_SESSION });
    });

    it('should free the id for a new player', () => {
      new Player('a', registry);
      registry.removePlayer('a');
      expect(() => new Player('a', registry)).not.toThrow();
    });

    it('should emit playerRemoved', () => {
      const player = new Player('a', registry);
      const listener = vi.fn();
      registry.on('playerRemoved', listener);

      registry.removePlayer('a');

      expect(listener).toHaveBeenCalledWith('a', player);
    });

    it('should remove every player on clear()', () => {
      new Player('a', registry);
      new Player('b', registry);
      registry.clear();
      expect(registry.size).toBe(0);
    });
  });

  describe('Logging', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should log connects and removals when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const verbose = new SessionRegistry({ verbose: true });

      new Player('a', verbose);
      verbose.removePlayer('a');

      expect(log).toHaveBeenNthCalledWith(1, '[Registry] Player connected: a (total: 1)');
      expect(log).toHaveBeenNthCalledWith(2, '[Registry] Player removed: a (total: 0)');
    });

    it('should stay quiet by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      new Player('a', registry);
      expect(log).not.toHaveBeenCalled();
    });
  });
});

describe('Default registry', () => {
  afterEach(() => {
    resetSessionRegistry();
  });

  it('should return the same instance until reset', () => {
    const registry = getSessionRegistry();
    expect(getSessionRegistry()).toBe(registry);

    resetSessionRegistry();
    expect(getSessionRegistry()).not.toBe(registry);
  });

  it('should register players that omit a registry', () => {
    const player = new Player('default-a');
    expect(getSessionRegistry().get('default-a')).toBe(player);
  });

  it('should remove players on reset', () => {
    const player = new Player('default-a');
    const sentinel = new Sentinel('Ada');
    player.assumeControl(sentinel);

    resetSessionRegistry();

    expect(sentinel.controller).toBeNull();
    expect(getSessionRegistry().has('default-a')).toBe(false);
  });
});

describe('Player', () => {
  it('should describe its session and receiver', () => {
    const registry = new SessionRegistry();
    const player = new Player('a', registry);
    expect(String(player)).toBe('id: a receiver: none');

    player.assumeControl(new Sentinel('Ada'));
    expect(String(player)).toBe('id: a receiver: Ada the Sentinel');
  });

  it('should throw EMPTY_QUEUE when reading without a command', () => {
    const player = new Player('a', new SessionRegistry());
    expect(catchError(() => player.readCmd())).toMatchObject({ code: ErrorCode.EMPTY_QUEUE });
  });
});
