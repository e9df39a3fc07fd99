import type { DeployerOptions } from '../../config/deployer-options';
import type { DeployLogSink } from '../../streaming/deploy-log.types';
import { ValidationError } from '../deployer.errors';
import type { Commit, Credentials, Payload, Repository } from '../payload';

export type ProviderId = 'bitbucket' | 'github' | 'gitlab';

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/** Origin of an absolute URL, or null when it does not parse. */
export function originOf(value: unknown): string | null {
  const url = nonEmptyString(value);
  if (!url) return null;
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

/**
 * One Git host: turns its push payload into a Payload and knows how to
 * build the clone URL for it. Adding a host means adding a subclass.
 */
export abstract class ProviderAdapter {
  abstract readonly id: ProviderId;
  /** Host name used in clone URLs, e.g. bitbucket.org */
  abstract readonly host: string;
  /** Origin the payload must claim, e.g. https://bitbucket.org */
  abstract readonly canonicalOriginUrl: string;
  /** Known webhook source addresses; seeds ipAllowList unless overridden */
  abstract readonly defaultIpAllowList: readonly string[] | null;

  /** Origin the raw payload claims, or null when it carries none. */
  protected abstract readOrigin(data: RawRecord): string | null;
  /** Commits oldest-first, or null when any entry lacks an id or message. */
  protected abstract readCommits(data: RawRecord): Commit[] | null;
  /** Repository identity, or null when any part of it is missing. */
  protected abstract readRepository(data: RawRecord): Repository | null;

  /**
   * Checks run in a fixed order and the first failure wins:
   * no data, wrong origin, no commits, malformed commits, missing
   * repository info.
   */
  validate(raw: unknown, log: DeployLogSink): Payload {
    log.log('info', 'Validation started');

    if (!isRecord(raw) || Object.keys(raw).length === 0) {
      throw new ValidationError('no data');
    }
    if (this.readOrigin(raw) !== this.canonicalOriginUrl) {
      throw new ValidationError('wrong origin');
    }
    const commits = this.readCommits(raw);
    if (commits?.length === 0) {
      throw new ValidationError('no commits');
    }
    if (!commits) {
      throw new ValidationError('malformed commits');
    }
    const repository = this.readRepository(raw);
    if (!repository) {
      throw new ValidationError('missing repository info');
    }

    log.log('info', 'Validation successful');
    return { canonicalOriginUrl: this.canonicalOriginUrl, commits, repository };
  }

  buildUrl(
    payload: Payload,
    options: Pick<DeployerOptions, 'useHttps'>,
    credentials: Credentials | null,
  ): string {
    let url = options.useHttps ? 'https://' : 'http://';
    if (options.useHttps && credentials?.username) {
      url += encodeURIComponent(credentials.username);
      if (credentials.password) url += `:${encodeURIComponent(credentials.password)}`;
      url += '@';
    }
    return `${url}${this.host}/${this.repositoryPath(payload.repository)}.git`;
  }

  protected repositoryPath(repository: Repository): string {
    return `${repository.owner}/${repository.slug}`;
  }
}

/**
 * Every entry must carry a string id and message; one that does not makes
 * the whole list null. Returns an empty list when `value` is not an array.
 */
export function readCommitList(value: unknown, idField: string): Commit[] | null {
  if (!Array.isArray(value)) return [];
  const commits: Commit[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) return null;
    const id = nonEmptyString(entry[idField]);
    const message = entry.message;
    if (!id || typeof message !== 'string') return null;
    commits.push({ id, message });
  }
  return commits;
}
