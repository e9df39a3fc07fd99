import { Controller, Query, Sse } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { DeployLogService } from './deploy-log.service';
import type { DeployLogEvent } from './deploy-log.types';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly deployLog: DeployLogService) {}

  /**
   * SSE endpoint for deploy log lines as they are written.
   * GET /stream/logs?destination=/var/log/deploy.log limits it to one log file.
   */
  @Sse('logs')
  @ApiOperation({ summary: 'SSE: real-time deploy log lines' })
  @ApiQuery({ name: 'destination', required: false })
  streamLogs(@Query('destination') destination?: string): Observable<{ data: DeployLogEvent }> {
    const stream = destination
      ? this.deployLog.getLogStreamForDestination(destination)
      : this.deployLog.getLogStream();
    return stream.pipe(map((ev) => ({ data: ev })));
  }
}
