import { ConfigService } from '@nestjs/config';
import { DeploymentLockService } from './deployment-lock.service';

describe('DeploymentLockService without a database', () => {
  const savedDatabaseUrl = process.env.DATABASE_URL;
  let locks: DeploymentLockService;

  beforeEach(() => {
    delete process.env.DATABASE_URL;
    locks = new DeploymentLockService(new ConfigService({}));
  });

  afterAll(() => {
    if (savedDatabaseUrl !== undefined) process.env.DATABASE_URL = savedDatabaseUrl;
  });

  it('lets one deploy hold a target at a time', async () => {
    const first = await locks.tryAcquire('/srv/site');
    const second = await locks.tryAcquire('/srv/site');

    expect(first.acquired).toBe(true);
    expect(second.acquired).toBe(false);
  });

  it('does not block other targets', async () => {
    await locks.tryAcquire('/srv/site');

    expect((await locks.tryAcquire('/srv/other')).acquired).toBe(true);
  });

  it('frees the target on release', async () => {
    const first = await locks.tryAcquire('/srv/site');
    await first.release();

    expect((await locks.tryAcquire('/srv/site')).acquired).toBe(true);
  });

  it('ignores release from a rejected attempt', async () => {
    await locks.tryAcquire('/srv/site');
    const rejected = await locks.tryAcquire('/srv/site');
    await rejected.release();

    expect((await locks.tryAcquire('/srv/site')).acquired).toBe(false);
  });
});
