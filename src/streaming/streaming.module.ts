import { Module } from '@nestjs/common';
import { DeployLogService } from './deploy-log.service';
import { SSEController } from './sse.controller';

@Module({
  controllers: [SSEController],
  providers: [DeployLogService],
  exports: [DeployLogService],
})
export class StreamingModule {}
