// TLS trust: certificates come from the operating system store, not a bundled CA file

import { Agent } from 'undici';
import { systemCertsAsync } from 'system-ca';
import { TrustStoreError } from './errors.js';

export interface TrustedAgentOptions {
  /** Socket connect timeout (default: 30s) */
  connectTimeoutMs?: number;
  /** Source of PEM certificates; defaults to the OS store */
  loadCertificates?: () => Promise<string[]>;
}

export async function loadSystemCertificates(): Promise<string[]> {
  return systemCertsAsync();
}

export async function createTrustedAgent(options: TrustedAgentOptions = {}): Promise<Agent> {
  const load = options.loadCertificates ?? loadSystemCertificates;

  let ca: string[];
  try {
    ca = await load();
  } catch (error) {
    throw new TrustStoreError('Could not read the operating system certificate store', error);
  }

  if (ca.length === 0) {
    throw new TrustStoreError('The operating system certificate store is empty');
  }

  return new Agent({
    connect: {
      ca,
      rejectUnauthorized: true,
      timeout: options.connectTimeoutMs ?? 30_000,
    },
  });
}
