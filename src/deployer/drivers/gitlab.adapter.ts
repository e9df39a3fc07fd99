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
 * GitLab push hook. path_with_namespace is "group/subgroup/project"; everything
 * before the last segment is the owner, project.path is the slug.
 */
export class GitLabAdapter extends ProviderAdapter {
  readonly id: ProviderId = 'gitlab';
  readonly host = 'gitlab.com';
  readonly canonicalOriginUrl = 'https://gitlab.com';
  readonly defaultIpAllowList = null;

  protected readOrigin(data: RawRecord): string | null {
    return isRecord(data.project) ? originOf(data.project.web_url) : null;
  }

  protected readCommits(data: RawRecord): Commit[] | null {
    return readCommitList(data.commits, 'id');
  }

  protected readRepository(data: RawRecord): Repository | null {
    const project = data.project;
    if (!isRecord(project)) return null;

    const fullPath = nonEmptyString(project.path_with_namespace);
    const name = nonEmptyString(project.name);
    const slug = nonEmptyString(project.path);
    const webUrl = nonEmptyString(project.web_url);
    if (!fullPath || !name || !slug || !webUrl) return null;

    const separator = fullPath.lastIndexOf('/');
    const owner = separator > 0 ? fullPath.slice(0, separator) : null;
    if (!owner) return null;

    return { owner, name, slug, absoluteUrl: new URL(webUrl).pathname };
  }
}
