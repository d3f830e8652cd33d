import { Command } from 'commander';
import { testDomainFromEnv, testZoneFromEnv, websupportOptionsFromEnv } from './config.js';
import { sameRecordName } from './domain.js';
import { websupport, type WebsupportOptions } from './providers/websupport.js';
import { delay } from './transport.js';
import type { DnsRecordManager, TxtRecord } from './types.js';
import { verifyTxtRecord } from './verify.js';

export interface CliDeps {
  version?: string;
  env?: Record<string, string | undefined>;
  createProvider?: (options: WebsupportOptions) => DnsRecordManager;
  verify?: (fqdn: string, expected: string) => Promise<boolean>;
  sleep?: (ms: number) => Promise<void>;
  /** Milliseconds since the epoch, used for unique test values */
  now?: () => number;
  log?: (line: string) => void;
}

function formatRecord(record: TxtRecord): string {
  const ttl = record.ttl !== undefined ? `${record.ttl / 1000}s` : '-';
  return `${record.name}  ${record.text}  ttl=${ttl}  id=${record.providerId ?? '-'}`;
}

/**
 * Build the `websupport-dns` command-line program.
 *
 * Credentials come from `WEBSUPPORT_*` environment variables. Every command
 * talks to the live API; `test` and `acme-test` clean up after themselves.
 */
export function createCli(deps: CliDeps = {}): Command {
  const env = deps.env ?? process.env;
  const createProvider = deps.createProvider ?? websupport;
  const verify = deps.verify ?? verifyTxtRecord;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const now = deps.now ?? Date.now;
  const log = deps.log ?? ((line: string) => console.log(line));

  function setup(zoneArg: string | undefined) {
    const provider = createProvider(websupportOptionsFromEnv(env));
    return { provider, zone: zoneArg || testZoneFromEnv(env) };
  }

  const program = new Command();

  program
    .name('websupport-dns')
    .description('Manage Websupport DNS TXT records for ACME DNS-01 challenges')
    .version(deps.version ?? '0.0.0');

  program
    .command('list [zone]')
    .description('List every TXT record in a zone')
    .action(async (zoneArg: string | undefined) => {
      const { provider, zone } = setup(zoneArg);
      const records = await provider.getRecords(zone);
      for (const record of records) {
        log(formatRecord(record));
      }
      log(`Found ${records.length} TXT record(s) in ${zone}`);
    });

  program
    .command('test [zone]')
    .description('Create, list and delete a throwaway TXT record')
    .action(async (zoneArg: string | undefined) => {
      const { provider, zone } = setup(zoneArg);

      log('Creating TXT record...');
      const created = await provider.appendRecords(zone, [
        {
          type: 'TXT',
          name: '_websupport-test',
          text: `test-value-${Math.floor(now() / 1000)}`,
          ttl: 120_000,
        },
      ]);
      for (const record of created) {
        log(`  + Created: ${formatRecord(record)}`);
      }

      log('Retrieving records...');
      const records = await provider.getRecords(zone);
      log(`  Found ${records.length} TXT record(s)`);
      for (const record of records) {
        log(`  ${formatRecord(record)}`);
      }

      log('Deleting record...');
      const deleted = await provider.deleteRecords(zone, created);
      log(`  - Deleted ${deleted.length} record(s)`);

      log('Done! All steps passed.');
    });

  program
    .command('acme-test [zone]')
    .description('Simulate a DNS-01 challenge (does not contact a certificate authority)')
    .option('-d, --domain <domain>', 'Domain whose challenge name is checked in public DNS')
    .option('-w, --wait <seconds>', 'Seconds to wait before the public DNS check', '5')
    .action(
      async (
        zoneArg: string | undefined,
        options: { domain?: string; wait: string }
      ) => {
        const { provider, zone } = setup(zoneArg);
        const domain = options.domain || testDomainFromEnv(env);
        const waitSeconds = Number(options.wait);
        if (!Number.isFinite(waitSeconds) || waitSeconds < 0) {
          throw new Error(`--wait must be a non-negative number, got "${options.wait}"`);
        }

        const challengeValue = Buffer.from(
          `test-acme-challenge-value-${Math.floor(now() / 1000)}`,
          'utf8'
        ).toString('base64url');

        log(`Creating DNS challenge record for ${domain}...`);
        const created = await provider.appendRecords(zone, [
          {
            type: 'TXT',
            name: '_acme-challenge',
            text: challengeValue,
            ttl: 120_000,
          },
        ]);
        for (const record of created) {
          log(`  + Created challenge record with id ${record.providerId ?? '(unresolved)'}`);
        }

        log(`Waiting ${waitSeconds}s for DNS propagation...`);
        await sleep(waitSeconds * 1000);

        const fqdn = `_acme-challenge.${domain}`;
        log(`Verifying ${fqdn} via public DNS...`);
        if (await verify(fqdn, challengeValue)) {
          log('  Record is publicly visible');
        } else {
          log('  Record is not publicly visible yet (normal for recent changes)');
        }

        log('Confirming through the API...');
        const records = await provider.getRecords(zone);
        const found = records.some(
          (r) =>
            sameRecordName(r.name, '_acme-challenge', zone) &&
            r.text === challengeValue
        );
        log(found ? '  Found challenge record' : '  Challenge record not found in API response');

        log('Cleaning up...');
        const deleted = await provider.deleteRecords(zone, created);
        log(`  - Deleted ${deleted.length} record(s)`);

        log('Done! DNS-01 simulation completed.');
      }
    );

  return program;
}
