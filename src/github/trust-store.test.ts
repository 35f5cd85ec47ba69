import { Agent } from 'undici';
import { TrustStoreError } from './errors.js';
import { createTrustedAgent } from './trust-store.js';

const PEM = '-----BEGIN CERTIFICATE-----\nTEST\n-----END CERTIFICATE-----\n';

describe('createTrustedAgent', () => {
  it('builds an agent from the loaded certificates', async () => {
    const loadCertificates = jest.fn(async () => [PEM]);

    const agent = await createTrustedAgent({ loadCertificates });

    expect(agent).toBeInstanceOf(Agent);
    expect(loadCertificates).toHaveBeenCalledTimes(1);
    await agent.close();
  });

  it('fails when the store cannot be read', async () => {
    const result = createTrustedAgent({
      loadCertificates: async () => {
        throw new Error('keychain locked');
      },
    });

    await expect(result).rejects.toBeInstanceOf(TrustStoreError);
    await expect(result).rejects.toThrow('Could not read the operating system certificate store');
  });

  it('fails when the store is empty', async () => {
    await expect(createTrustedAgent({ loadCertificates: async () => [] })).rejects.toThrow(
      'The operating system certificate store is empty'
    );
  });
});
