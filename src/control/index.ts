/**
 * Control Layer Module
 *
 * Export controllers, receivers, the session registry, composites
 * and protocol constants
 */

// Contracts
export { BaseController, isController, receiveCmd } from './controller.js';
export type { Controller, Command, Message } from './controller.js';
export { isReceiver } from './receiver.js';
export type { Receiver } from './receiver.js';

// Queues
export { Channel } from './channel.js';

// Sessions
export { Player } from './player.js';
export { SessionRegistry, getSessionRegistry, resetSessionRegistry } from './registry.js';
export type { SessionId } from './registry.js';

// Composites
export { MultiController, combine } from './multicontroller.js';
export { Monoreceiver } from './monoreceiver.js';
export { Multireceiver, MemberAdapter } from './multireceiver.js';
export type { RoutedMessage } from './multireceiver.js';

// Configuration
export {
  RegistryConfigSchema,
  MultireceiverConfigSchema,
  CliConfigSchema,
  DEFAULT_REGISTRY_CONFIG,
  DEFAULT_MULTIRECEIVER_CONFIG,
  DEFAULT_CLI_CONFIG,
  resolveConfig,
  parseCliConfigFile,
} from './config.js';
export type { RegistryConfig, MultireceiverConfig, CliConfig } from './config.js';

// Protocol
export {
  DEFAULT_WINDOW_FACTOR,
  ErrorCode,
  ERROR_MESSAGES,
  ControlError,
  createError,
  formatSpeakerHeader,
  formatLostConnection,
} from './protocol.js';
