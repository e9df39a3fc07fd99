import { UnknownProviderError } from '../deployer.errors';
import { BitbucketAdapter } from './bitbucket.adapter';
import { ProviderRegistry } from './provider.registry';

describe('ProviderRegistry', () => {
  const registry = new ProviderRegistry();

  it('lists every supported host', () => {
    expect(registry.ids()).toEqual(['bitbucket', 'github', 'gitlab']);
  });

  it('looks providers up case-insensitively', () => {
    expect(registry.get('BitBucket')).toBeInstanceOf(BitbucketAdapter);
  });

  it('rejects an unknown provider', () => {
    expect(() => registry.get('gitea')).toThrow(UnknownProviderError);
  });
});
