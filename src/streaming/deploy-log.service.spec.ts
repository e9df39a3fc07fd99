import { Logger } from '@nestjs/common';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeployLogService, formatLogLine } from './deploy-log.service';
import type { DeployLogEvent } from './deploy-log.types';

describe('DeployLogService', () => {
  let dir: string;
  let service: DeployLogService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'deploy-log-'));
    service = new DeployLogService();
    service.now = () => new Date('2026-10-19T08:30:00.000Z');
  });

  afterEach(async () => {
    await service.onModuleDestroy();
    await rm(dir, { recursive: true, force: true });
  });

  it('formats a line', () => {
    expect(
      formatLogLine({
        destination: '/tmp/deploy.log',
        level: 'info',
        message: 'Deploy completed.',
        timestamp: '2026-10-19T08:30:00.000Z',
      }),
    ).toBe('[2026-10-19T08:30:00.000Z] INFO: Deploy completed.\n');
  });

  it('appends lines in order and creates missing directories', async () => {
    const destination = join(dir, 'logs', 'nested', 'deploy.log');
    const sink = service.forDestination(destination);

    sink.log('info', 'Validation started');
    sink.log('info', 'Validation successful');
    await sink.flush();

    expect(await readFile(destination, 'utf8')).toBe(
      '[2026-10-19T08:30:00.000Z] INFO: Validation started\n' +
        '[2026-10-19T08:30:00.000Z] INFO: Validation successful\n',
    );
  });

  it('hands out one sink per destination', () => {
    const destination = join(dir, 'deploy.log');

    expect(service.forDestination(destination)).toBe(service.forDestination(destination));
  });

  it('publishes every line on the log stream', async () => {
    const first = join(dir, 'first.log');
    const second = join(dir, 'second.log');
    const all: DeployLogEvent[] = [];
    const onlyFirst: string[] = [];
    service.getLogStream().subscribe((event) => all.push(event));
    service.getLogStreamForDestination(first).subscribe((event) => onlyFirst.push(event.message));

    service.forDestination(first).log('info', 'one');
    service.forDestination(second).log('warn', 'two');
    await service.forDestination(first).flush();
    await service.forDestination(second).flush();

    expect(all).toEqual([
      { destination: first, level: 'info', message: 'one', timestamp: '2026-10-19T08:30:00.000Z' },
      { destination: second, level: 'warn', message: 'two', timestamp: '2026-10-19T08:30:00.000Z' },
    ]);
    expect(onlyFirst).toEqual(['one']);
  });
});
