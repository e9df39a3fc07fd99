import type { Commit } from './payload';

/** Opt-in marker: with autoDeploy off, only commits carrying it are deployed. */
export const DEPLOY_MARKER = '[deploy]';

/** Opt-out marker: with autoDeploy on, commits carrying it are skipped. */
export const SKIP_MARKER = '[skipdeploy]';

/**
 * Pick the commit to deploy, walking from the most recent commit back.
 * The most recent qualifying commit wins; returns null when none qualifies.
 *
 * @param commits - Oldest first, as delivered by the host.
 * @param onSkip - Called for every commit passed over before the match.
 */
export function selectCommit(
  commits: readonly Commit[],
  autoDeploy: boolean,
  onSkip: (commit: Commit) => void = () => {},
): string | null {
  const qualifies = autoDeploy
    ? (commit: Commit) => !commit.message.includes(SKIP_MARKER)
    : (commit: Commit) => commit.message.includes(DEPLOY_MARKER);

  for (const commit of [...commits].reverse()) {
    if (qualifies(commit)) return commit.id;
    onSkip(commit);
  }
  return null;
}
