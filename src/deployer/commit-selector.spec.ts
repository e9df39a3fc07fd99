import { DEPLOY_MARKER, SKIP_MARKER, selectCommit } from './commit-selector';
import type { Commit } from './payload';

describe('selectCommit', () => {
  const plainThenSkipped: Commit[] = [
    { id: 'a', message: 'x' },
    { id: 'b', message: '[skipdeploy] y' },
  ];

  it('uses the exact marker strings', () => {
    expect(DEPLOY_MARKER).toBe('[deploy]');
    expect(SKIP_MARKER).toBe('[skipdeploy]');
  });

  describe('auto-deploy mode', () => {
    it('skips the most recent commit when it carries the skip marker', () => {
      const skipped: string[] = [];
      const id = selectCommit(plainThenSkipped, true, (commit) => skipped.push(commit.id));

      expect(id).toBe('a');
      expect(skipped).toEqual(['b']);
    });

    it('returns the most recent commit when nothing is marked', () => {
      const commits: Commit[] = [
        { id: 'a', message: 'one' },
        { id: 'b', message: 'two' },
        { id: 'c', message: 'three' },
      ];

      expect(selectCommit(commits, true)).toBe('c');
    });

    it('returns null when every commit is skipped', () => {
      const commits: Commit[] = [
        { id: 'a', message: 'wip [skipdeploy]' },
        { id: 'b', message: '[skipdeploy]' },
      ];
      const skipped: string[] = [];

      expect(selectCommit(commits, true, (commit) => skipped.push(commit.id))).toBeNull();
      expect(skipped).toEqual(['b', 'a']);
    });
  });

  describe('opt-in mode', () => {
    it('returns null when no commit carries the deploy marker', () => {
      const skipped: string[] = [];

      expect(selectCommit(plainThenSkipped, false, (commit) => skipped.push(commit.id))).toBeNull();
      expect(skipped).toEqual(['b', 'a']);
    });

    it('returns a marked commit', () => {
      expect(selectCommit([{ id: 'a', message: '[deploy] release' }], false)).toBe('a');
    });

    it('prefers the most recent marked commit', () => {
      const commits: Commit[] = [
        { id: 'a', message: '[deploy] 1.0' },
        { id: 'b', message: 'release [deploy] 1.1' },
        { id: 'c', message: 'docs' },
      ];
      const skipped: string[] = [];

      expect(selectCommit(commits, false, (commit) => skipped.push(commit.id))).toBe('b');
      expect(skipped).toEqual(['c']);
    });

    it('does not treat the skip marker as a deploy marker', () => {
      expect(selectCommit([{ id: 'a', message: '[skipdeploy]' }], false)).toBeNull();
    });
  });

  it('leaves the input order untouched', () => {
    const commits = [...plainThenSkipped];
    selectCommit(commits, true);

    expect(commits.map((commit) => commit.id)).toEqual(['a', 'b']);
  });

  it('returns null for an empty list', () => {
    expect(selectCommit([], true)).toBeNull();
  });
});
