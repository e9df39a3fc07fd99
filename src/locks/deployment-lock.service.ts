import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient } from 'pg';

const LOCK_PREFIX = 'deploy:';

export interface AcquireResult {
  acquired: boolean;
  release: () => Promise<void>;
}

/**
 * One deploy per target directory at a time.
 *
 * With DATABASE_URL set the lock is a PostgreSQL advisory lock, so several
 * processes (or hosts sharing a volume) exclude each other. The lock is held
 * on a dedicated connection and goes away with it if the process dies.
 * Without a database, a set of held targets guards this process only.
 */
@Injectable()
export class DeploymentLockService implements OnModuleDestroy {
  private pool: Pool | null = null;
  private readonly held = new Set<string>();

  constructor(private readonly configService: ConfigService) {}

  private getPool(): Pool | null {
    const connectionString = this.configService.get<string>('DATABASE_URL');
    if (!connectionString) return null;
    if (!this.pool) {
      this.pool = new Pool({ connectionString });
    }
    return this.pool;
  }

  /**
   * Non-blocking: returns immediately with acquired true/false.
   * When acquired, call result.release() once the deploy finishes.
   */
  async tryAcquire(targetDirectory: string): Promise<AcquireResult> {
    const key = LOCK_PREFIX + targetDirectory;
    const pool = this.getPool();
    return pool ? this.tryAcquireAdvisory(pool, key) : this.tryAcquireLocal(key);
  }

  private tryAcquireLocal(key: string): AcquireResult {
    if (this.held.has(key)) {
      return { acquired: false, release: async () => {} };
    }
    this.held.add(key);
    return {
      acquired: true,
      release: async () => {
        this.held.delete(key);
      },
    };
  }

  private async tryAcquireAdvisory(pool: Pool, key: string): Promise<AcquireResult> {
    const client: PoolClient = await pool.connect();

    try {
      const result = await client.query<{ acquired: boolean }>(
        `SELECT pg_try_advisory_lock(hashtext($1)) AS "acquired"`,
        [key],
      );
      const acquired = Boolean(result.rows[0]?.acquired);

      if (!acquired) {
        client.release();
        return { acquired: false, release: async () => {} };
      }

      const release = async (): Promise<void> => {
        try {
          await client.query(`SELECT pg_advisory_unlock(hashtext($1))`, [key]);
        } finally {
          client.release();
        }
      };

      return { acquired: true, release };
    } catch (err) {
      client.release();
      throw err;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
