import { Injectable } from '@nestjs/common';
import { UnknownProviderError } from '../deployer.errors';
import { BitbucketAdapter } from './bitbucket.adapter';
import { GitHubAdapter } from './github.adapter';
import { GitLabAdapter } from './gitlab.adapter';
import type { ProviderAdapter } from './provider-adapter';

/** Adapters by id; the :provider route segment is looked up here. */
@Injectable()
export class ProviderRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>();

  constructor() {
    for (const adapter of [new BitbucketAdapter(), new GitHubAdapter(), new GitLabAdapter()]) {
      this.adapters.set(adapter.id, adapter);
    }
  }

  /** @throws UnknownProviderError */
  get(id: string): ProviderAdapter {
    const adapter = this.adapters.get(id.toLowerCase());
    if (!adapter) throw new UnknownProviderError(id);
    return adapter;
  }

  ids(): string[] {
    return [...this.adapters.keys()];
  }
}
