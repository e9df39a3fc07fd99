import { isAbsolute, resolve } from 'node:path';
import { ConfigService } from '@nestjs/config';
import type { Credentials } from '../deployer/payload';

export interface DeployerOptions {
  /** Forced to true once credentials are supplied */
  useHttps: boolean;
  targetDirectory: string;
  /**
   * true: every commit deploys unless it carries [skipdeploy].
   * false: only commits carrying [deploy] are deployed.
   */
  autoDeploy: boolean;
  branch: string;
  /** null or empty means no filtering */
  ipAllowList: readonly string[] | null;
  logDestination: string;
}

export const DEPLOYER_OPTION_KEYS = [
  'useHttps',
  'targetDirectory',
  'autoDeploy',
  'branch',
  'ipAllowList',
  'logDestination',
] as const satisfies readonly (keyof DeployerOptions)[];

export function defaultDeployerOptions(cwd = process.cwd()): DeployerOptions {
  return {
    useHttps: true,
    targetDirectory: cwd,
    autoDeploy: true,
    branch: 'master',
    ipAllowList: null,
    logDestination: resolve(cwd, 'deploy.log'),
  };
}

/**
 * Copy only the recognized keys of `update` onto `options`.
 * Keys outside DEPLOYER_OPTION_KEYS and undefined values are ignored.
 */
export function mergeDeployerOptions(
  options: DeployerOptions,
  update: Partial<DeployerOptions>,
): DeployerOptions {
  const merged: DeployerOptions = { ...options };
  for (const key of DEPLOYER_OPTION_KEYS) {
    assignOption(merged, key, update[key]);
  }
  return merged;
}

function assignOption<K extends keyof DeployerOptions>(
  target: DeployerOptions,
  key: K,
  value: DeployerOptions[K] | undefined,
): void {
  if (value !== undefined) target[key] = value;
}

export function resolvePath(path: string, cwd = process.cwd()): string {
  return isAbsolute(path) ? path : resolve(cwd, path);
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

export function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new Error(`Invalid ${name} value: ${raw}`);
}

export function parseIpList(raw: string): string[] | null {
  const ips = raw
    .split(',')
    .map((ip) => ip.trim())
    .filter(Boolean);
  return ips.length > 0 ? ips : null;
}

/**
 * Options set through DEPLOY_* environment variables.
 * Unset variables are left out so the provider defaults still apply.
 */
export function loadDeployerOptions(
  config: ConfigService,
  cwd = process.cwd(),
): Partial<DeployerOptions> {
  const options: Partial<DeployerOptions> = {};

  const useHttps = config.get<string>('DEPLOY_USE_HTTPS');
  if (useHttps !== undefined) options.useHttps = parseBoolean('DEPLOY_USE_HTTPS', useHttps);

  const target = config.get<string>('DEPLOY_TARGET');
  if (target) options.targetDirectory = resolvePath(target, cwd);

  const autoDeploy = config.get<string>('DEPLOY_AUTO');
  if (autoDeploy !== undefined) options.autoDeploy = parseBoolean('DEPLOY_AUTO', autoDeploy);

  const branch = config.get<string>('DEPLOY_BRANCH');
  if (branch) options.branch = branch.trim();

  // An explicitly empty list turns the provider's default filter off.
  const ipAllowList = config.get<string>('DEPLOY_IP_ALLOW_LIST');
  if (ipAllowList !== undefined) options.ipAllowList = parseIpList(ipAllowList);

  const logFile = config.get<string>('DEPLOY_LOG_FILE');
  if (logFile) options.logDestination = resolvePath(logFile, cwd);

  return options;
}

export function loadCredentials(config: ConfigService): Credentials | null {
  const username = config.get<string>('DEPLOY_USERNAME');
  if (!username) return null;
  const password = config.get<string>('DEPLOY_PASSWORD');
  return password ? { username, password } : { username };
}
