import { lookup, lookupService } from 'dns/promises';
import type { SF } from '@loki-worker/service-framework-node';

export interface HostResolver {
  lookup(hostname: string): Promise<{ address: string }>;
  lookupService(address: string, port: number): Promise<{ hostname: string }>;
}

export const systemResolver: HostResolver = {
  lookup: (hostname) => lookup(hostname),
  lookupService: (address, port) => lookupService(address, port),
};

/**
 * Canonical name of the host as the system resolver sees it (hosts file
 * included). Falls back to the bare host name when it has no dotted name.
 */
export async function resolveFqdn(host: string, resolver: HostResolver, logger: SF.Logger): Promise<string> {
  try {
    const { address } = await resolver.lookup(host);
    const { hostname } = await resolver.lookupService(address, 0);
    return hostname.includes('.') ? hostname : host;
  } catch (error) {
    logger.warn('Could not resolve the unit FQDN, using the host name', {
      host,
      error: error instanceof Error ? error.message : String(error),
    });
    return host;
  }
}
