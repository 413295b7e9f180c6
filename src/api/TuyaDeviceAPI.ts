/**
 * Tuya Device API
 *
 * Device queries and control on top of the signed OpenAPI client.
 */

import type { Logging } from 'homebridge';
import { CommandRejectedError } from '../errors';
import { DEVICE_LIST_PAGE_SIZE, SWITCH_CHANNELS } from '../settings';
import type {
  SwitchCode,
  SwitchStates,
  TuyaDevice,
  TuyaDeviceCommand,
  TuyaDeviceFunctions,
  TuyaDeviceListPage,
  TuyaDeviceStatus,
  TuyaDeviceSummary,
} from './response';
import type { QueryParams } from './signing';
import { TuyaOpenAPI } from './TuyaOpenAPI';

export const switchCode = (channel: number): SwitchCode => {
  if (!Number.isInteger(channel) || channel < 1 || channel > SWITCH_CHANNELS) {
    throw new RangeError(`Switch channel must be between 1 and ${SWITCH_CHANNELS} (got ${channel})`);
  }
  return `switch_${channel}`;
};

const isSwitchCode = (code: string): code is SwitchCode => /^switch_\d+$/.test(code);

/**
 * Switch data points come back as booleans from most firmware, but some
 * report 1/0 or their string forms
 */
export const isOn = (value: TuyaDeviceStatus['value']): boolean => {
  switch (typeof value) {
    case 'boolean':
      return value;
    case 'number':
      return value === 1;
    default:
      return value.toLowerCase() === 'true' || value === '1';
  }
};

export class TuyaDeviceAPI {
  constructor(
    private readonly api: TuyaOpenAPI,
    private readonly log?: Logging,
  ) {}

  /**
   * Get all devices linked to the cloud project, following pagination
   */
  public async getDeviceList(): Promise<TuyaDeviceSummary[]> {
    const devices: TuyaDeviceSummary[] = [];
    const query: QueryParams = { size: DEVICE_LIST_PAGE_SIZE };
    let fetches = 0;
    let hasMore = true;

    while (hasMore) {
      const response = await this.api.request<TuyaDeviceListPage>(
        '/v1.0/iot-01/associated-users/devices',
        'GET',
        undefined,
        { query },
      );
      fetches++;

      const page: TuyaDeviceListPage = response.result ?? {};
      for (const device of page.devices ?? page.list ?? []) {
        devices.push({ id: device.id ?? '', name: device.name ?? '' });
      }

      hasMore = page.has_more === true && Boolean(page.last_row_key);
      if (page.last_row_key) {
        query.last_row_key = page.last_row_key;
      }
    }

    this.log?.debug('Found', devices.length, 'devices in', fetches, 'page(s)');
    return devices;
  }

  /**
   * Get the current status of a device
   */
  public async getDeviceStatus(deviceId: string): Promise<TuyaDeviceStatus[]> {
    const response = await this.api.request<TuyaDeviceStatus[]>(
      `/v1.0/devices/${deviceId}/status`,
      'GET',
      undefined,
      { deviceId },
    );
    return response.result ?? [];
  }

  /**
   * Get detailed device information
   */
  public async getDeviceInfo(deviceId: string): Promise<TuyaDevice> {
    const response = await this.api.request<TuyaDevice>(
      `/v1.0/devices/${deviceId}`,
      'GET',
      undefined,
      { deviceId },
    );

    if (!response.result) {
      throw new CommandRejectedError(`No device info returned for ${deviceId}`);
    }
    return response.result;
  }

  /**
   * Get the instruction set (codes, types and value ranges) a device accepts
   */
  public async getDeviceFunctions(deviceId: string): Promise<TuyaDeviceFunctions> {
    const response = await this.api.request<TuyaDeviceFunctions>(
      `/v1.0/iot-03/devices/${deviceId}/functions`,
      'GET',
      undefined,
      { deviceId },
    );
    return response.result ?? { category: '', functions: [] };
  }

  /**
   * Send commands to a device
   */
  public async sendCommands(deviceId: string, commands: TuyaDeviceCommand[]): Promise<boolean> {
    this.log?.debug(`Sending commands to ${deviceId}:`, JSON.stringify(commands));
    const response = await this.api.request<boolean>(
      `/v1.0/devices/${deviceId}/commands`,
      'POST',
      { commands },
      { deviceId },
    );
    return response.result ?? true;
  }

  public async sendCommand(deviceId: string, command: TuyaDeviceCommand): Promise<boolean> {
    return this.sendCommands(deviceId, [command]);
  }

  /**
   * Turn one gang of a multi-gang switch on or off
   */
  public async setSwitch(deviceId: string, channel: number, on: boolean): Promise<boolean> {
    const code = switchCode(channel);
    this.log?.info(`Turning ${code} ${on ? 'on' : 'off'} on ${deviceId}`);
    return this.sendCommand(deviceId, { code, value: on });
  }

  /**
   * Read the on/off state of every gang the device reports
   */
  public async getSwitchStates(deviceId: string): Promise<SwitchStates> {
    const status = await this.getDeviceStatus(deviceId);
    const states: SwitchStates = {};
    for (const { code, value } of status) {
      if (isSwitchCode(code)) {
        states[code] = isOn(value);
      }
    }
    return states;
  }

  /**
   * Invert one gang and return its new state
   */
  public async toggleSwitch(deviceId: string, channel: number): Promise<boolean> {
    const code = switchCode(channel);
    const states = await this.getSwitchStates(deviceId);
    const next = !states[code];
    await this.setSwitch(deviceId, channel, next);
    return next;
  }
}
