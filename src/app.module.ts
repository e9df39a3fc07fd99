import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { DeployerModule } from './deployer/deployer.module';
import { LocksModule } from './locks/locks.module';
import { StreamingModule } from './streaming/streaming.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LocksModule,
    StreamingModule,
    DeployerModule,
    WebhooksModule,
  ],
})
export class AppModule {}
