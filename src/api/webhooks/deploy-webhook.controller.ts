import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Ip,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { DeployerService } from '../../deployer/deployer.service';
import {
  AccessDeniedError,
  DeployError,
  DeployLockedError,
  TargetDirectoryError,
  UnknownProviderError,
  ValidationError,
} from '../../deployer/deployer.errors';
import { isRecord } from '../../deployer/drivers/provider-adapter';
import { ProviderRegistry } from '../../deployer/drivers/provider.registry';

/**
 * Bitbucket's legacy POST hook sends a form body whose `payload` field holds
 * the JSON; everything else posts JSON directly.
 */
export function readWebhookBody(body: unknown): unknown {
  if (isRecord(body) && typeof body.payload === 'string') {
    try {
      return JSON.parse(body.payload);
    } catch {
      throw new BadRequestException('Invalid JSON payload');
    }
  }
  return body;
}

/** Express reports IPv4 peers on a dual-stack socket as ::ffff:a.b.c.d */
export function normalizeRemoteIp(ip: string): string {
  return ip.startsWith('::ffff:') ? ip.slice('::ffff:'.length) : ip;
}

function toHttpException(err: unknown): unknown {
  if (err instanceof UnknownProviderError) return new NotFoundException(err.message);
  if (err instanceof ValidationError) return new BadRequestException(`Data Error: ${err.message}`);
  if (err instanceof AccessDeniedError) return new ForbiddenException(err.message);
  if (err instanceof DeployLockedError) return new ConflictException(err.message);
  if (err instanceof DeployError) {
    return new InternalServerErrorException({
      message: 'Deploy failed',
      command: err.command,
      exitCode: err.exitCode,
      output: err.output,
    });
  }
  if (err instanceof TargetDirectoryError) {
    return new InternalServerErrorException({
      message: 'Deploy failed',
      targetDirectory: err.targetDirectory,
      reason: err.reason,
    });
  }
  return err;
}

@Controller('webhooks')
@ApiTags('webhooks')
export class DeployWebhookController {
  constructor(
    private readonly deployerService: DeployerService,
    private readonly registry: ProviderRegistry,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List the Git hosts webhooks are accepted from' })
  listProviders() {
    return { providers: this.registry.ids() };
  }

  /**
   * Receive a push webhook and bring the target directory to the selected commit.
   * Responds once the deploy has finished.
   */
  @Post(':provider')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Receive a push webhook and deploy the selected commit' })
  @ApiParam({ name: 'provider', example: 'bitbucket' })
  @ApiBody({
    description: 'Push payload as JSON, or a form body with the JSON in its `payload` field.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handlePush(
    @Param('provider') provider: string,
    @Body() body: unknown,
    @Ip() ip: string,
  ) {
    const raw = readWebhookBody(body);
    try {
      const result = await this.deployerService.handleWebhook(
        provider,
        raw,
        normalizeRemoteIp(ip),
      );
      return result.status === 'deployed'
        ? { status: 'deployed', commit: result.commit }
        : { status: 'skipped' };
    } catch (err) {
      throw toHttpException(err);
    }
  }
}
