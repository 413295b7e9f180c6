import nock from 'nock';
import type { Logging } from 'homebridge';
import { runCli, USAGE } from '../src/cli';
import { BASE_URL, createMockLogger, failReply, okReply, tokenReply } from './helpers';

const env = {
  TUYA_ACCESS_ID: 'test-id',
  TUYA_ACCESS_KEY: 'test-secret',
  TUYA_BASE_URL: BASE_URL,
  DEVICE_ID: 'dev-1',
};

describe('runCli', () => {
  let output: string[];
  let log: Logging;

  const run = (...argv: string[]) => runCli(argv, {
    env,
    log,
    print: (text) => output.push(text),
  });

  const stubToken = () =>
    nock(BASE_URL).get('/v1.0/token').query({ grant_type: '1' }).reply(200, tokenReply('cli-token'));

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    nock.cleanAll();
    output = [];
    log = createMockLogger();
  });

  it('should print usage and exit 2 without a command', async () => {
    await expect(run()).resolves.toBe(2);
    expect(output).toEqual([USAGE]);
  });

  it('should exit 1 when required variables are missing', async () => {
    const code = await runCli(['status'], { env: { TUYA_ACCESS_ID: 'test-id' }, log, print: (text) => output.push(text) });

    expect(code).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      'Missing required environment variables: TUYA_ACCESS_KEY, TUYA_BASE_URL, DEVICE_ID',
    );
  });

  it('should switch a gang on the default device', async () => {
    stubToken();
    const command = nock(BASE_URL)
      .post('/v1.0/devices/dev-1/commands', { commands: [{ code: 'switch_2', value: true }] })
      .matchHeader('access_token', 'cli-token')
      .reply(200, okReply(true));

    await expect(run('switch', '2', 'on')).resolves.toBe(0);
    expect(command.isDone()).toBe(true);
    expect(output).toEqual(['switch_2 = on']);
  });

  it('should toggle a gang on the given device', async () => {
    stubToken();
    nock(BASE_URL)
      .get('/v1.0/devices/dev-2/status')
      .reply(200, okReply([{ code: 'switch_1', value: true }]));
    nock(BASE_URL)
      .post('/v1.0/devices/dev-2/commands', { commands: [{ code: 'switch_1', value: false }] })
      .reply(200, okReply(true));

    await expect(run('toggle', '1', 'dev-2')).resolves.toBe(0);
    expect(output).toEqual(['switch_1 = off']);
  });

  it('should print the device status as JSON', async () => {
    stubToken();
    nock(BASE_URL)
      .get('/v1.0/devices/dev-1/status')
      .reply(200, okReply([{ code: 'switch_1', value: false }]));

    await expect(run('status')).resolves.toBe(0);
    expect(output).toEqual([JSON.stringify([{ code: 'switch_1', value: false }], null, 2)]);
  });

  it('should exit 2 on an invalid channel without calling Tuya', async () => {
    await expect(run('switch', '5', 'on')).resolves.toBe(2);
    expect(log.error).toHaveBeenCalledWith('Switch channel must be between 1 and 4 (got 5)');
    expect(output).toEqual([USAGE]);
  });

  it('should exit 2 on an unknown command', async () => {
    await expect(run('reboot')).resolves.toBe(2);
    expect(log.error).toHaveBeenCalledWith('Unknown command: reboot');
  });

  it('should report a rejected command and exit 1', async () => {
    stubToken();
    nock(BASE_URL)
      .post('/v1.0/devices/missing/commands')
      .reply(200, failReply(1106, 'permission deny'));

    await expect(run('switch', '1', 'off', 'missing')).resolves.toBe(1);
    expect(log.error).toHaveBeenCalledWith('DeviceNotFoundError: Device not found: missing (permission deny)');
  });

  it('should report bad credentials and exit 1', async () => {
    nock(BASE_URL).get('/v1.0/token').query({ grant_type: '1' }).reply(200, failReply(1004, 'sign invalid'));

    await expect(run('token')).resolves.toBe(1);
    expect(log.error).toHaveBeenCalledWith('AuthenticationError: Failed to get access token: sign invalid');
  });

  it('should log through its own console logger when none is injected', async () => {
    const stdout = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      const missing = await runCli(['status'], { env: {}, print: (text) => output.push(text) });
      expect(missing).toBe(1);
      expect(String(stderr.mock.calls[0][0])).toContain(
        'Missing required environment variables: TUYA_ACCESS_ID, TUYA_ACCESS_KEY, TUYA_BASE_URL, DEVICE_ID',
      );

      stubToken();
      nock(BASE_URL)
        .get('/v1.0/devices/dev-1/status')
        .reply(200, okReply([{ code: 'switch_4', value: true }]));

      await expect(runCli(['status'], { env, print: (text) => output.push(text) })).resolves.toBe(0);
      expect(output).toEqual([JSON.stringify([{ code: 'switch_4', value: true }], null, 2)]);
      expect(stdout.mock.calls.some(([line]) => String(line).includes('[tuya-switch]'))).toBe(true);
    } finally {
      stdout.mockRestore();
      stderr.mockRestore();
    }
  });

  it('should print the token and its expiry', async () => {
    stubToken();

    await expect(run('token')).resolves.toBe(0);
    expect(output[0]).toBe('Access token: cli-token');
    expect(output[1]).toMatch(/^Expires at: \d{4}-\d{2}-\d{2}T/);
    expect(output[2]).toBe('Token is still valid.');
  });
});
