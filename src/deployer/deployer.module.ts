import { Module } from '@nestjs/common';
import { LocksModule } from '../locks/locks.module';
import { StreamingModule } from '../streaming/streaming.module';
import { CommandRunnerService } from './command-runner.service';
import { DeployerService } from './deployer.service';
import { ProviderRegistry } from './drivers/provider.registry';
import { WorkspaceService } from './workspace';

@Module({
  imports: [LocksModule, StreamingModule],
  providers: [ProviderRegistry, CommandRunnerService, WorkspaceService, DeployerService],
  exports: [ProviderRegistry, DeployerService],
})
export class DeployerModule {}
