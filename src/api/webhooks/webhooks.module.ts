import { Module } from '@nestjs/common';
import { DeployerModule } from '../../deployer/deployer.module';
import { DeployWebhookController } from './deploy-webhook.controller';

@Module({
  imports: [DeployerModule],
  controllers: [DeployWebhookController],
})
export class WebhooksModule {}
