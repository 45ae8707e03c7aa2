/**
 * URL Safety - guards outbound downloads
 *
 * Only http and https are fetched. Loopback, private, link-local and cloud
 * metadata hosts are refused unless the caller allows private hosts; host
 * names are resolved first so a public name pointing at a private address
 * is refused too.
 */

import { lookup } from 'dns/promises';
import { isIP } from 'net';
import { logger } from './logger.js';

const log = logger.create('UrlSafety');

export type UrlBlockCategory = 'invalid' | 'protocol' | 'localhost' | 'private_ip' | 'link_local' | 'metadata';

export interface UrlSafetyOptions {
  allowPrivateHosts: boolean;
  /** Resolves a host name to its addresses */
  lookup?: HostLookup;
}

export type HostLookup = (hostname: string) => Promise<string[]>;

export const lookupAddresses: HostLookup = async (hostname) =>
  (await lookup(hostname, { all: true })).map((entry) => entry.address);

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

const METADATA_HOSTS = new Set(['169.254.169.254', '100.100.100.200', 'metadata.google.internal', 'metadata.gke.io']);

const LOCAL_NAMES = new Set(['localhost', 'localhost.localdomain']);

/**
 * Raised when a URL may not be fetched.
 */
export class BlockedUrlError extends Error {
  readonly kind = 'invalid_task';

  constructor(
    public readonly url: string,
    public readonly category: UrlBlockCategory,
    reason: string
  ) {
    super(`Refusing to fetch ${url}: ${reason}`);
    this.name = 'BlockedUrlError';
  }
}

function ipv4Octets(address: string): number[] | null {
  if (isIP(address) !== 4) return null;
  return address.split('.').map(Number);
}

/**
 * Category of a literal IP address that must not be fetched, or null.
 */
export function classifyAddress(address: string): UrlBlockCategory | null {
  const bare = address.replace(/^\[|\]$/g, '').toLowerCase();

  if (METADATA_HOSTS.has(bare)) return 'metadata';

  const mapped = bare.match(/^::ffff:(\d+\.\d+\.\d+\.\d+)$/);
  const octets = ipv4Octets(mapped ? mapped[1] : bare);
  if (octets) {
    const [a, b] = octets;
    if (a === 127 || a === 0) return 'localhost';
    if (a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168)) return 'private_ip';
    if (a === 169 && b === 254) return 'link_local';
    return null;
  }

  if (isIP(bare) === 6) {
    if (bare === '::1' || bare === '::') return 'localhost';
    if (/^fe[89ab]/.test(bare)) return 'link_local';
    if (/^f[cd]/.test(bare)) return 'private_ip';
  }
  return null;
}

function blockReason(category: UrlBlockCategory, host: string): string {
  switch (category) {
    case 'localhost':
      return `loopback host ${host}`;
    case 'private_ip':
      return `private address ${host}`;
    case 'link_local':
      return `link-local address ${host}`;
    case 'metadata':
      return `cloud metadata endpoint ${host}`;
    default:
      return host;
  }
}

/**
 * Parse and check a URL, resolving its host when it is a name.
 */
export async function assertSafeUrl(url: string, options: UrlSafetyOptions): Promise<URL> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new BlockedUrlError(url, 'invalid', 'not a valid URL');
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new BlockedUrlError(url, 'protocol', `scheme ${parsed.protocol} is not allowed; use http or https`);
  }

  if (options.allowPrivateHosts) return parsed;

  const host = parsed.hostname.toLowerCase();
  if (LOCAL_NAMES.has(host) || host.endsWith('.localhost')) {
    throw new BlockedUrlError(url, 'localhost', blockReason('localhost', host));
  }
  if (METADATA_HOSTS.has(host)) {
    throw new BlockedUrlError(url, 'metadata', blockReason('metadata', host));
  }

  let addresses: string[];
  if (isIP(host.replace(/^\[|\]$/g, '')) !== 0) {
    addresses = [host];
  } else {
    try {
      addresses = await (options.lookup ?? lookupAddresses)(host);
    } catch (error) {
      // The request itself reports an unresolvable host
      log.debug('Host lookup failed', { host, error: error instanceof Error ? error.message : String(error) });
      addresses = [];
    }
  }

  for (const address of addresses) {
    const category = classifyAddress(address);
    if (category) {
      throw new BlockedUrlError(url, category, blockReason(category, address));
    }
  }
  return parsed;
}
