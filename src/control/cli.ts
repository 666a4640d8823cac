#!/usr/bin/env node
/**
 * multicontrol CLI
 *
 * Local console session: stdin lines become commands for one player,
 * and the messages they produce are printed back.
 *
 * Usage:
 *   multicontrol                                   # Default party
 *   multicontrol --party Sentinel:Ada              # Drive one character
 *   multicontrol --party Sentinel:Ada,Wanderer:Bo  # Drive a group
 *
 * @module control/cli
 */

import meow from 'meow';
import { readFileSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { Player } from './player.js';
import { SessionRegistry } from './registry.js';
import { Multireceiver } from './multireceiver.js';
import type { Receiver } from './receiver.js';
import { CliConfigSchema, DEFAULT_CLI_CONFIG, parseCliConfigFile, resolveConfig, type CliConfig } from './config.js';
import { characterKinds, createCharacter } from '../entities/roster.js';

const cli = meow(`
  Usage
    $ multicontrol [options]

  Options
    --session <id>          Session ID of the local player (default: ${DEFAULT_CLI_CONFIG.session})
    --party <Kind:Name,...> Characters to drive; several form a group
    --window-factor <n>     Dedup window size per group member (default: ${DEFAULT_CLI_CONFIG.windowFactor})
    --config <file>         JSON file with any of the options above
    -v, --verbose           Log sessions and evictions

  Character kinds
    ${characterKinds().join(', ')}

  Examples
    $ multicontrol --party Sentinel:Ada
    $ multicontrol --party Sentinel:Ada,Sentinel:Bram -v
`, {
  importMeta: import.meta,
  flags: {
    session: {
      type: 'string',
    },
    party: {
      type: 'string',
    },
    windowFactor: {
      type: 'number',
    },
    config: {
      type: 'string',
    },
    verbose: {
      type: 'boolean',
      shortFlag: 'v',
    },
  },
});

function loadConfig(): CliConfig {
  const overrides: Partial<CliConfig> = cli.flags.config
    ? parseCliConfigFile(readFileSync(cli.flags.config, 'utf-8'))
    : {};

  if (cli.flags.session !== undefined) {
    overrides.session = cli.flags.session;
  }
  if (cli.flags.party !== undefined) {
    overrides.party = cli.flags.party.split(',').map(entry => entry.trim());
  }
  if (cli.flags.windowFactor !== undefined) {
    overrides.windowFactor = cli.flags.windowFactor;
  }
  if (cli.flags.verbose !== undefined) {
    overrides.verbose = cli.flags.verbose;
  }

  return resolveConfig(CliConfigSchema, DEFAULT_CLI_CONFIG, overrides);
}

function buildParty(config: CliConfig): Receiver {
  const members = config.party.map(entry => {
    const [kind, name] = entry.split(':');
    return createCharacter(kind, name);
  });
  const [first, ...rest] = members;
  if (rest.length === 0) {
    return first;
  }
  return new Multireceiver(members, {
    windowFactor: config.windowFactor,
    verbose: config.verbose,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const registry = new SessionRegistry({ verbose: config.verbose });
  const player = new Player(config.session, registry);
  const party = buildParty(config);
  player.assumeControl(party);

  console.log(`[*] Controlling ${config.party.join(', ')}`);
  console.log('[*] Type "help" for commands, Ctrl+D to quit.\n');

  const lines = createInterface({ input: process.stdin, terminal: false });
  for await (const line of lines) {
    registry.sendCommand(config.session, line);
    for (const [, message] of registry.receiveMessages()) {
      console.log(message);
    }
  }

  registry.removePlayer(config.session);
}

main().catch(error => {
  console.error(`[!] ${error instanceof Error ? error.message : String(error)}`);
  if (cli.flags.verbose) {
    console.error(error);
  }
  process.exit(1);
});
