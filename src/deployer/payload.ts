/**
 * Normalized webhook data, independent of the Git host's wire format.
 * Produced by a ProviderAdapter once every required field has been checked.
 */
export interface Commit {
  /** Revision identifier (full SHA for every supported host) */
  readonly id: string;
  readonly message: string;
}

export interface Repository {
  readonly owner: string;
  readonly name: string;
  /** URL-safe repository identifier used to build the clone URL */
  readonly slug: string;
  /** Repository path on the host, e.g. /acme/widgets/ */
  readonly absoluteUrl: string;
}

export interface Payload {
  /** Host origin the payload claims to come from, e.g. https://bitbucket.org */
  readonly canonicalOriginUrl: string;
  /** Oldest first, as delivered by the host */
  readonly commits: readonly Commit[];
  readonly repository: Repository;
}

export interface Credentials {
  readonly username: string;
  readonly password?: string;
}
