import {
  type DeployerOptions,
  defaultDeployerOptions,
  mergeDeployerOptions,
  resolvePath,
} from '../config/deployer-options';
import type { DeployLogSink } from '../streaming/deploy-log.types';
import type { CommandRunner } from './command-runner.service';
import { selectCommit } from './commit-selector';
import { AccessDeniedError, DeployError, TargetDirectoryError } from './deployer.errors';
import type { ProviderAdapter } from './drivers/provider-adapter';
import type { Credentials, Payload } from './payload';
import type { Workspace } from './workspace';

export type DeployState =
  | 'idle'
  | 'url-resolved'
  | 'commit-selected'
  | 'repository-checked'
  | 'branch-updated'
  | 'commit-checked-out'
  | 'done'
  | 'noop';

export type DeployResult =
  | { status: 'deployed'; commit: string; url: string }
  | { status: 'noop' };

export interface DeployLogSource {
  forDestination(path: string): DeployLogSink;
}

export interface DeployerCollaborators {
  runner: CommandRunner;
  workspace: Workspace;
  logs: DeployLogSource;
}

const GIT = 'git';

/** Hide the password part of any user:password@ in a URL or command line. */
export function maskCredentials(text: string): string {
  return text.replace(/\/\/([^/@\s:]+):([^/@\s]+)@/g, '//$1:***@');
}

/**
 * Brings a target directory to the commit a push payload asks for.
 * One instance serves one webhook delivery.
 *
 * Git runs with the target directory as its cwd; the process working
 * directory is never changed.
 */
export class Deployer {
  private options: DeployerOptions;
  private credentials: Credentials | null = null;
  private currentState: DeployState = 'idle';

  constructor(
    readonly adapter: ProviderAdapter,
    private readonly collaborators: DeployerCollaborators,
    options: Partial<DeployerOptions> = {},
  ) {
    this.options = { ...defaultDeployerOptions(), ipAllowList: adapter.defaultIpAllowList };
    this.configure(options);
  }

  get config(): Readonly<DeployerOptions> {
    return this.options;
  }

  get state(): DeployState {
    return this.currentState;
  }

  private get log(): DeployLogSink {
    return this.collaborators.logs.forDestination(this.options.logDestination);
  }

  /** Overwrites recognized option keys only; anything else is ignored. */
  configure(update: Partial<DeployerOptions>): void {
    const merged = mergeDeployerOptions(this.options, update);
    this.options = {
      ...merged,
      targetDirectory: resolvePath(merged.targetDirectory),
      logDestination: resolvePath(merged.logDestination),
    };
  }

  authenticate(username: string, password?: string): void {
    this.credentials = password ? { username, password } : { username };
    this.options = { ...this.options, useHttps: true };
    this.log.log('info', `Signing in as "${username}".`);
  }

  /** @throws AccessDeniedError when an allow-list is set and does not hold `remoteIp` */
  authorizeRequest(remoteIp: string): void {
    const allowed = this.options.ipAllowList;
    if (allowed && allowed.length > 0 && !allowed.includes(remoteIp)) {
      throw new AccessDeniedError(remoteIp);
    }
    this.log.log('info', `IP address ${remoteIp} permitted.`);
  }

  /** @throws ValidationError */
  validate(raw: unknown): Payload {
    return this.adapter.validate(raw, this.log);
  }

  buildUrl(payload: Payload): string {
    return this.adapter.buildUrl(payload, this.options, this.credentials);
  }

  findCommit(payload: Payload): string | null {
    return selectCommit(payload.commits, this.options.autoDeploy, (commit) =>
      this.log.log('info', `Skipping node "${commit.id}".`),
    );
  }

  /**
   * @throws DeployError when a git step after the repository probe fails;
   * the remaining steps are not run.
   * @throws TargetDirectoryError when the missing target cannot be created
   */
  async deploy(payload: Payload): Promise<DeployResult> {
    const log = this.log;
    try {
      const url = this.buildUrl(payload);
      this.currentState = 'url-resolved';
      const commit = this.findCommit(payload);
      this.currentState = 'commit-selected';

      if (!url || !commit) {
        log.log('info', 'No node found to deploy.');
        this.currentState = 'noop';
        log.log('info', 'Deploy completed.');
        return { status: 'noop' };
      }

      log.log('info', `Commit "${commit}" will be checked out.`);
      const target = this.options.targetDirectory;
      const { workspace } = this.collaborators;

      if (!(await workspace.exists(target))) {
        log.log('info', `Target directory not found, creating directory at ${target}`);
        await this.createTarget(target);
      }

      if (!(await this.isRepository(target))) {
        log.log('info', 'Repository not found. Cloning repository.');
        await this.execute(target, ['init']);
        await this.execute(target, ['remote', 'add', 'origin', url]);
      }
      this.currentState = 'repository-checked';

      log.log('info', `Checking out repository at ${commit}`);
      await this.execute(target, ['fetch', 'origin', this.options.branch]);
      this.currentState = 'branch-updated';

      await this.execute(target, ['checkout', commit]);
      this.currentState = 'commit-checked-out';

      this.currentState = 'done';
      log.log('info', 'Deploy completed.');
      return { status: 'deployed', commit, url: maskCredentials(url) };
    } finally {
      await log.flush();
    }
  }

  private async createTarget(target: string): Promise<void> {
    try {
      await this.collaborators.workspace.ensureDir(target);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.log('info', `Could not create directory at ${target}: ${reason}`);
      throw new TargetDirectoryError(target, reason);
    }
  }

  /**
   * Probe failure means "not a repository yet". The target must be the
   * repository root; a directory nested inside another checkout does not count.
   */
  private async isRepository(target: string): Promise<boolean> {
    const result = await this.run(target, ['rev-parse', '--git-dir']);
    return result.exitCode === 0 && result.output.trim() === '.git';
  }

  private async execute(cwd: string, args: string[]): Promise<void> {
    const result = await this.run(cwd, args);
    const command = maskCredentials([GIT, ...args].join(' '));
    const output = maskCredentials(result.output);
    if (result.exitCode !== 0) {
      this.log.log(
        'info',
        `Command "${command}" failed with exit code ${result.exitCode}. Output:\n${output}`,
      );
      throw new DeployError(command, output, result.exitCode);
    }
    if (output.trim()) {
      this.log.log('info', `Output:\n${output}`);
    }
  }

  private async run(cwd: string, args: string[]) {
    this.log.log('info', `Executing command: ${maskCredentials([GIT, ...args].join(' '))}`);
    return this.collaborators.runner.run(GIT, args, { cwd });
  }
}
