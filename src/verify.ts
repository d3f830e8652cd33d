import dns from 'node:dns';
import createDebug from 'debug';
import { errorMessage } from './errors.js';

const debug = createDebug('websupport-dns:verify');

/** Public resolvers, to avoid a stale negative cache on the local one */
export const PUBLIC_RESOLVERS = ['1.1.1.1', '8.8.8.8'];

/**
 * Check whether a TXT record containing `expected` is visible in public DNS.
 *
 * Lookup errors (NXDOMAIN, timeouts) count as "not visible".
 */
export async function verifyTxtRecord(
  fqdn: string,
  expected: string,
  servers: string[] = PUBLIC_RESOLVERS
): Promise<boolean> {
  const resolver = new dns.promises.Resolver();
  resolver.setServers(servers);

  try {
    const records = await resolver.resolveTxt(fqdn);
    return records.some((chunks) => chunks.join('').includes(expected));
  } catch (err) {
    debug('TXT lookup for %s failed: %s', fqdn, errorMessage(err));
    return false;
  }
}
