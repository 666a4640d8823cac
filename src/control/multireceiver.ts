/**
 * Multireceiver: a group of receivers driven by one controller
 *
 * Every member is driven by a private MemberAdapter, so members never see
 * the external controller. Each update:
 * 1. Evicts members that another controller took over
 * 2. Copies every external command onto the adapter of each member it
 *    still drives
 * 3. Updates every member
 *
 * Member messages are forwarded with a `[member]` header on speaker
 * change. A message already forwarded for a different member within the
 * dedup window is dropped, so several members reporting the same event
 * produce one line.
 *
 * @module control/multireceiver
 */

import { BaseController, type Command, type Controller, type Message } from './controller.js';
import { Channel } from './channel.js';
import { Monoreceiver } from './monoreceiver.js';
import { isReceiver, type Receiver } from './receiver.js';
import {
  DEFAULT_MULTIRECEIVER_CONFIG,
  MultireceiverConfigSchema,
  resolveConfig,
  type MultireceiverConfig,
} from './config.js';
import { ControlError, ErrorCode, formatLostConnection, formatSpeakerHeader } from './protocol.js';

/**
 * A message forwarded on behalf of a member
 */
export interface RoutedMessage {
  readonly member: Receiver;
  readonly message: Message;
}

/**
 * Private controller for a single member. Commands are queued by the
 * owning Multireceiver; messages go back through its router.
 */
export class MemberAdapter extends BaseController {
  private readonly commands = new Channel<Command>();

  constructor(
    public readonly member: Receiver,
    private readonly route: (message: Message) => void,
    private readonly upstream: () => Controller | null
  ) {
    super();
  }

  readCmd(): Command {
    return this.commands.take();
  }

  cmdReady(signal?: AbortSignal): Promise<void> {
    return this.commands.ready(signal);
  }

  addCmd(command: Command): void {
    this.commands.push(command);
  }

  clearCmds(): void {
    this.commands.clear();
  }

  writeMsg(message: Message): void {
    this.route(message);
  }

  hasCmd(): boolean {
    return !this.commands.isEmpty();
  }

  /**
   * Whether the external controller has unread messages. Diagnostic only.
   */
  hasMsg(): boolean {
    return this.upstream()?.hasMsg() ?? false;
  }
}

export class Multireceiver extends Monoreceiver implements Iterable<Receiver> {
  private readonly adapters: Map<Receiver, MemberAdapter> = new Map();
  private readonly config: MultireceiverConfig;
  private window: RoutedMessage[] = [];
  private windowCapacity = 0;

  constructor(members: Iterable<Receiver>, config?: Partial<MultireceiverConfig>) {
    super();
    this.config = resolveConfig(MultireceiverConfigSchema, DEFAULT_MULTIRECEIVER_CONFIG, config);

    for (const member of members) {
      if (!isReceiver(member)) {
        throw new ControlError(ErrorCode.INVALID_MEMBER, 'Cannot add non-Receiver to Multireceiver');
      }
      this.adapters.set(
        member,
        new MemberAdapter(
          member,
          message => this.routeMessage(member, message),
          () => this.controller
        )
      );
    }
    this.resize();
  }

  [Symbol.iterator](): Iterator<Receiver> {
    return this.adapters.keys();
  }

  /** Number of active members */
  get size(): number {
    return this.adapters.size;
  }

  /** Dedup window capacity */
  get capacity(): number {
    return this.windowCapacity;
  }

  get recentMessages(): readonly RoutedMessage[] {
    return this.window;
  }

  /**
   * The adapter driving a member, or undefined once it has been evicted
   */
  adapterFor(member: Receiver): MemberAdapter | undefined {
    return this.adapters.get(member);
  }

  override attach(controller: Controller): void {
    if (controller === this.controller) {
      return;
    }
    super.attach(controller);
    for (const [member, adapter] of this.adapters) {
      adapter.assumeControl(member);
    }
  }

  /**
   * Silent. Only members still driven by their adapter are detached, so a
   * member taken over out of band stays with its new controller.
   */
  override detach(): void {
    if (this.controller === null) {
      return;
    }
    super.detach();
    for (const [member, adapter] of this.adapters) {
      if (member.controller === adapter) {
        member.detach();
      }
      adapter.clearCmds();
    }
  }

  update(): void {
    this.evictLostMembers();

    const controller = this.controller;
    if (controller) {
      while (controller.hasCmd()) {
        const command = controller.readCmd();
        for (const [member, adapter] of this.adapters) {
          // A detached member has nothing draining its adapter
          if (member.controller === adapter) {
            adapter.addCmd(command);
          }
        }
      }
    }

    for (const member of this.adapters.keys()) {
      member.update();
    }
  }

  private evictLostMembers(): void {
    for (const [member, adapter] of this.adapters) {
      const owner = member.controller;
      if (owner === null || owner === adapter) {
        continue;
      }
      this.controller?.writeMsg(formatLostConnection(member));
      this.adapters.delete(member);
      this.resize();

      if (this.config.verbose) {
        console.warn(`[Multireceiver] Member lost: ${String(member)} (remaining: ${this.adapters.size})`);
      }
    }
  }

  private routeMessage(member: Receiver, message: Message): void {
    this.trimWindow();

    const duplicate = this.window.some(entry => entry.message === message && entry.member !== member);
    if (duplicate) {
      return;
    }

    const controller = this.controller;
    if (!controller) {
      return;
    }

    const last = this.window.at(-1);
    if (!last || last.member !== member) {
      controller.writeMsg(formatSpeakerHeader(member));
    }
    controller.writeMsg(message);
    this.window.push({ member, message });
    this.trimWindow();
  }

  private resize(): void {
    this.windowCapacity = Math.floor(this.adapters.size * this.config.windowFactor);
  }

  private trimWindow(): void {
    if (this.window.length > this.windowCapacity) {
      this.window = this.window.slice(this.window.length - this.windowCapacity);
    }
  }
}
