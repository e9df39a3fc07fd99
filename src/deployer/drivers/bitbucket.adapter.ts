import type { Commit, Repository } from '../payload';
import {
  ProviderAdapter,
  type ProviderId,
  type RawRecord,
  isRecord,
  nonEmptyString,
  readCommitList,
} from './provider-adapter';

/**
 * Bitbucket's POST hook:
 * { canon_url, commits: [{ raw_node, message }], repository: { absolute_url, owner, name, slug } }
 */
export class BitbucketAdapter extends ProviderAdapter {
  readonly id: ProviderId = 'bitbucket';
  readonly host = 'bitbucket.org';
  readonly canonicalOriginUrl = 'https://bitbucket.org';
  readonly defaultIpAllowList = ['63.246.22.222'];

  protected readOrigin(data: RawRecord): string | null {
    return nonEmptyString(data.canon_url);
  }

  protected readCommits(data: RawRecord): Commit[] | null {
    return readCommitList(data.commits, 'raw_node');
  }

  protected readRepository(data: RawRecord): Repository | null {
    const repository = data.repository;
    if (!isRecord(repository)) return null;

    const absoluteUrl = nonEmptyString(repository.absolute_url);
    const owner = nonEmptyString(repository.owner);
    const name = nonEmptyString(repository.name);
    const slug = nonEmptyString(repository.slug);
    if (!absoluteUrl || !owner || !name || !slug) return null;

    return { owner, name, slug, absoluteUrl };
  }
}
