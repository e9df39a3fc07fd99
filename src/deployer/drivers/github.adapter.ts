import type { Commit, Repository } from '../payload';
import {
  ProviderAdapter,
  type ProviderId,
  type RawRecord,
  isRecord,
  nonEmptyString,
  originOf,
  readCommitList,
} from './provider-adapter';

/**
 * GitHub push event. The origin comes from repository.html_url; the owner is
 * owner.login, or owner.name on payloads that carry the older shape.
 */
export class GitHubAdapter extends ProviderAdapter {
  readonly id: ProviderId = 'github';
  readonly host = 'github.com';
  readonly canonicalOriginUrl = 'https://github.com';
  // GitHub publishes CIDR ranges, not single addresses.
  readonly defaultIpAllowList = null;

  protected readOrigin(data: RawRecord): string | null {
    return isRecord(data.repository) ? originOf(data.repository.html_url) : null;
  }

  protected readCommits(data: RawRecord): Commit[] | null {
    return readCommitList(data.commits, 'id');
  }

  protected readRepository(data: RawRecord): Repository | null {
    const repository = data.repository;
    if (!isRecord(repository) || !isRecord(repository.owner)) return null;

    const owner = nonEmptyString(repository.owner.login) ?? nonEmptyString(repository.owner.name);
    const name = nonEmptyString(repository.name);
    const htmlUrl = nonEmptyString(repository.html_url);
    if (!owner || !name || !htmlUrl) return null;

    return { owner, name, slug: name, absoluteUrl: new URL(htmlUrl).pathname };
  }
}
