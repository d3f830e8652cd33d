import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createCli } from '../src/cli.js';
import { ConfigError } from '../src/errors.js';
import type { TxtRecord } from '../src/types.js';

const env = {
  WEBSUPPORT_API_KEY: 'test-key',
  WEBSUPPORT_API_SECRET: 'test-secret',
  WEBSUPPORT_SERVICE_ID: '42',
};

const provider = {
  appendRecords: vi.fn(),
  deleteRecords: vi.fn(),
  getRecords: vi.fn(),
};
const createProvider = vi.fn(() => provider);
const verify = vi.fn();
const sleep = vi.fn();
let lines: string[] = [];

function run(args: string[], cliEnv: Record<string, string | undefined> = env) {
  return createCli({
    env: cliEnv,
    createProvider,
    verify,
    sleep,
    now: () => 1700000000123,
    log: (line) => lines.push(line),
  }).parseAsync(args, { from: 'user' });
}

beforeEach(() => {
  vi.clearAllMocks();
  sleep.mockResolvedValue(undefined);
  lines = [];
});

describe('websupport-dns CLI', () => {
  it('builds the provider from WEBSUPPORT_* variables', async () => {
    provider.getRecords.mockResolvedValueOnce([]);

    await run(['list']);

    expect(createProvider).toHaveBeenCalledWith({
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      serviceId: '42',
    });
  });

  it('fails with a ConfigError when credentials are missing', async () => {
    await expect(run(['list'], {})).rejects.toThrow(ConfigError);
    expect(createProvider).not.toHaveBeenCalled();
  });

  describe('list', () => {
    it('prints every TXT record of the zone', async () => {
      provider.getRecords.mockResolvedValueOnce([
        { type: 'TXT', name: '_acme-challenge', text: 'token-1', ttl: 120_000, providerId: '7' },
        { type: 'TXT', name: '@', text: 'v=spf1 -all' },
      ]);

      await run(['list', 'example.org']);

      expect(provider.getRecords).toHaveBeenCalledWith('example.org');
      expect(lines).toEqual([
        '_acme-challenge  token-1  ttl=120s  id=7',
        '@  v=spf1 -all  ttl=-  id=-',
        'Found 2 TXT record(s) in example.org',
      ]);
    });

    it('defaults to WEBSUPPORT_TEST_ZONE', async () => {
      provider.getRecords.mockResolvedValueOnce([]);

      await run(['list'], { ...env, WEBSUPPORT_TEST_ZONE: 'example.net' });

      expect(provider.getRecords).toHaveBeenCalledWith('example.net');
    });
  });

  describe('test', () => {
    it('creates, lists and deletes a test record', async () => {
      const created: TxtRecord = {
        type: 'TXT',
        name: '_websupport-test',
        text: 'test-value-1700000000',
        ttl: 120_000,
        providerId: '7',
      };
      provider.appendRecords.mockResolvedValueOnce([created]);
      provider.getRecords.mockResolvedValueOnce([created]);
      provider.deleteRecords.mockResolvedValueOnce([created]);

      await run(['test', 'example.org']);

      expect(provider.appendRecords).toHaveBeenCalledWith('example.org', [
        { type: 'TXT', name: '_websupport-test', text: 'test-value-1700000000', ttl: 120_000 },
      ]);
      expect(provider.deleteRecords).toHaveBeenCalledWith('example.org', [created]);
      expect(lines).toEqual([
        'Creating TXT record...',
        '  + Created: _websupport-test  test-value-1700000000  ttl=120s  id=7',
        'Retrieving records...',
        '  Found 1 TXT record(s)',
        '  _websupport-test  test-value-1700000000  ttl=120s  id=7',
        'Deleting record...',
        '  - Deleted 1 record(s)',
        'Done! All steps passed.',
      ]);
    });

    it('stops at the first failing step', async () => {
      provider.appendRecords.mockRejectedValueOnce(new Error('Websupport: failed to create record'));

      await expect(run(['test'])).rejects.toThrow('Websupport: failed to create record');
      expect(provider.deleteRecords).not.toHaveBeenCalled();
    });
  });

  describe('acme-test', () => {
    const challengeValue = 'dGVzdC1hY21lLWNoYWxsZW5nZS12YWx1ZS0xNzAwMDAwMDAw';
    const created: TxtRecord = {
      type: 'TXT',
      name: '_acme-challenge',
      text: challengeValue,
      ttl: 120_000,
      providerId: '9',
    };

    it('runs the DNS-01 simulation end to end', async () => {
      provider.appendRecords.mockResolvedValueOnce([created]);
      verify.mockResolvedValueOnce(true);
      provider.getRecords.mockResolvedValueOnce([
        { ...created, name: '_acme-challenge.example.com.' },
      ]);
      provider.deleteRecords.mockResolvedValueOnce([created]);

      await run(['acme-test']);

      expect(provider.appendRecords).toHaveBeenCalledWith('example.com', [
        { type: 'TXT', name: '_acme-challenge', text: challengeValue, ttl: 120_000 },
      ]);
      expect(sleep).toHaveBeenCalledWith(5000);
      expect(verify).toHaveBeenCalledWith(
        '_acme-challenge.libdns.example.com',
        challengeValue
      );
      expect(lines).toEqual([
        'Creating DNS challenge record for libdns.example.com...',
        '  + Created challenge record with id 9',
        'Waiting 5s for DNS propagation...',
        'Verifying _acme-challenge.libdns.example.com via public DNS...',
        '  Record is publicly visible',
        'Confirming through the API...',
        '  Found challenge record',
        'Cleaning up...',
        '  - Deleted 1 record(s)',
        'Done! DNS-01 simulation completed.',
      ]);
    });

    it('honours --domain and --wait', async () => {
      provider.appendRecords.mockResolvedValueOnce([created]);
      verify.mockResolvedValueOnce(false);
      provider.getRecords.mockResolvedValueOnce([]);
      provider.deleteRecords.mockResolvedValueOnce([]);

      await run(['acme-test', 'example.org', '--domain', 'app.example.org', '--wait', '0']);

      expect(sleep).toHaveBeenCalledWith(0);
      expect(verify).toHaveBeenCalledWith('_acme-challenge.app.example.org', challengeValue);
      expect(lines).toContain('  Record is not publicly visible yet (normal for recent changes)');
      expect(lines).toContain('  Challenge record not found in API response');
    });

    it('rejects a negative --wait', async () => {
      await expect(run(['acme-test', '--wait', '-1'])).rejects.toThrow(
        '--wait must be a non-negative number, got "-1"'
      );
      expect(provider.appendRecords).not.toHaveBeenCalled();
    });
  });
});
