#!/usr/bin/env node
/**
 * tuya-switch command line
 *
 * Reads credentials from `.env`, then queries or drives one device.
 */

import * as dotenv from 'dotenv';
import type { Logging } from 'homebridge';
import { switchCode } from './api/TuyaDeviceAPI';
import { Environment, loadConfig, TuyaClientConfig } from './config';
import { TuyaError } from './errors';
import { createTuyaClient, TuyaClient } from './index';
import { createLogger } from './logger';
import { CLIENT_NAME, SWITCH_CHANNELS } from './settings';

export const USAGE = [
  `Usage: ${CLIENT_NAME} <command> [arguments]`,
  '',
  'Commands:',
  '  token                              Get (or reuse) an access token and show its expiry',
  '  devices                            List the devices linked to the cloud project',
  '  functions [deviceId]               Show the instruction set of a device',
  '  status [deviceId]                  Show the current status of a device',
  `  switch <1-${SWITCH_CHANNELS}> <on|off> [deviceId]     Turn one gang on or off`,
  `  toggle <1-${SWITCH_CHANNELS}> [deviceId]              Invert one gang`,
  '',
  'deviceId defaults to DEVICE_ID from the environment.',
].join('\n');

export interface CliDependencies {
  env: Environment;
  print: (text: string) => void;
  log?: Logging;
  createClient?: (config: TuyaClientConfig, log?: Logging) => Promise<TuyaClient>;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

const parseChannel = (raw: string | undefined): number => {
  if (raw === undefined) {
    throw new UsageError('Missing switch channel');
  }
  const channel = Number(raw);
  try {
    switchCode(channel);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
  return channel;
};

const parseOnOff = (raw: string | undefined): boolean => {
  switch (raw?.toLowerCase()) {
    case 'on':
    case 'true':
    case '1':
      return true;
    case 'off':
    case 'false':
    case '0':
      return false;
    default:
      throw new UsageError(`Expected "on" or "off" (got "${raw ?? ''}")`);
  }
};

const json = (value: unknown): string => JSON.stringify(value, null, 2);

async function runCommand(
  command: string,
  args: string[],
  client: TuyaClient,
  print: (text: string) => void,
): Promise<void> {
  const { api, devices, config } = client;

  switch (command) {
    case 'token': {
      const tokens = await api.ensureToken();
      print(`Access token: ${tokens.accessToken}`);
      print(`Expires at: ${new Date(tokens.expiresAt).toISOString()}`);
      print(`Token is ${api.getTokenState().state === 'valid' ? 'still valid' : 'expired'}.`);
      return;
    }
    case 'devices':
      print(json(await devices.getDeviceList()));
      return;
    case 'functions':
      print(json(await devices.getDeviceFunctions(args[0] ?? config.deviceId)));
      return;
    case 'status':
      print(json(await devices.getDeviceStatus(args[0] ?? config.deviceId)));
      return;
    case 'switch': {
      const channel = parseChannel(args[0]);
      const on = parseOnOff(args[1]);
      await devices.setSwitch(args[2] ?? config.deviceId, channel, on);
      print(`${switchCode(channel)} = ${on ? 'on' : 'off'}`);
      return;
    }
    case 'toggle': {
      const channel = parseChannel(args[0]);
      const on = await devices.toggleSwitch(args[1] ?? config.deviceId, channel);
      print(`${switchCode(channel)} = ${on ? 'on' : 'off'}`);
      return;
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Run one CLI invocation and resolve with the process exit code
 * (0 success, 1 failure, 2 bad usage).
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const [command, ...args] = argv;
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    deps.print(USAGE);
    return command ? 0 : 2;
  }

  let config: TuyaClientConfig;
  try {
    config = loadConfig(deps.env);
  } catch (error) {
    (deps.log ?? createLogger()).error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const log = deps.log ?? createLogger(config.debug);
  const client = await (deps.createClient ?? createTuyaClient)(config, log);

  try {
    await runCommand(command, args, client, deps.print);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      log.error(error.message);
      deps.print(USAGE);
      return 2;
    }
    if (error instanceof TuyaError) {
      log.error(`${error.name}: ${error.message}`);
    } else {
      log.error('Unexpected error:', error instanceof Error ? error.message : String(error));
    }
    return 1;
  } finally {
    client.close();
  }
}

if (require.main === module) {
  dotenv.config();
  runCli(process.argv.slice(2), { env: process.env, print: (text) => console.log(text) })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
