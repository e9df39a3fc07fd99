import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  type DeployerOptions,
  loadCredentials,
  loadDeployerOptions,
} from '../config/deployer-options';
import { DeploymentLockService } from '../locks/deployment-lock.service';
import { DeployLogService } from '../streaming/deploy-log.service';
import { CommandRunnerService } from './command-runner.service';
import { type DeployResult, Deployer } from './deployer';
import { DeployLockedError } from './deployer.errors';
import { ProviderRegistry } from './drivers/provider.registry';
import type { Credentials } from './payload';
import { WorkspaceService } from './workspace';

/**
 * Wires a Deployer per webhook delivery from the environment and runs it
 * under the target directory's deploy lock.
 */
@Injectable()
export class DeployerService {
  private readonly logger = new Logger(DeployerService.name);
  private readonly options: Partial<DeployerOptions>;
  private readonly credentials: Credentials | null;

  constructor(
    configService: ConfigService,
    private readonly registry: ProviderRegistry,
    private readonly runner: CommandRunnerService,
    private readonly workspace: WorkspaceService,
    private readonly deployLog: DeployLogService,
    private readonly locks: DeploymentLockService,
  ) {
    // Bad DEPLOY_* values fail here, at startup, rather than on the first webhook.
    this.options = loadDeployerOptions(configService);
    this.credentials = loadCredentials(configService);
  }

  /** @throws UnknownProviderError */
  createDeployer(providerId: string): Deployer {
    const deployer = new Deployer(
      this.registry.get(providerId),
      { runner: this.runner, workspace: this.workspace, logs: this.deployLog },
      this.options,
    );
    if (this.credentials) {
      deployer.authenticate(this.credentials.username, this.credentials.password);
    }
    return deployer;
  }

  /**
   * Authorize, validate, then deploy. Authorization and validation failures
   * happen before any filesystem or git side effect.
   *
   * @throws UnknownProviderError | AccessDeniedError | ValidationError | DeployLockedError | DeployError
   */
  async handleWebhook(providerId: string, raw: unknown, remoteIp: string): Promise<DeployResult> {
    const deployer = this.createDeployer(providerId);
    deployer.authorizeRequest(remoteIp);
    const payload = deployer.validate(raw);

    const target = deployer.config.targetDirectory;
    const lock = await this.locks.tryAcquire(target);
    if (!lock.acquired) {
      this.logger.warn(`Deploy lock busy for ${target}; rejecting delivery from ${remoteIp}`);
      throw new DeployLockedError(target);
    }

    try {
      return await deployer.deploy(payload);
    } finally {
      await lock.release();
    }
  }
}
