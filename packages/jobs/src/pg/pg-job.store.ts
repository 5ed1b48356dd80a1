import type { Pool, PoolClient } from 'pg';
import { logger } from '@pipeline/shared';
import type { Job, NewJob } from '../job.types';
import type {
  CreateJobResult,
  JobFilter,
  JobStore,
  JobTransition,
  ListPendingOptions,
  StatusTypeCount,
} from '../job.store';
import {
  IdempotencyKeyConflictError,
  JobInsertFailedError,
  UnknownDependencyError,
} from '../errors';

const JOB_COLUMNS =
  'id, subject_id, operation_type, status, details, error, created_at, completed_at';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

// Must match the predicate of jobs_live_idempotency_key in db/migrations.
const LIVE_KEY_PREDICATE =
  "details->>'idempotency_key' IS NOT NULL AND status NOT IN ('CANCELLED', 'DEAD_LETTER')";

/**
 * PostgreSQL job store. Status changes are single conditional UPDATEs, so
 * concurrent workers in different processes cannot claim the same job.
 */
export class PgJobStore implements JobStore {
  constructor(
    private readonly pool: Pool,
    private readonly txClient: PoolClient | null = null,
  ) {}

  async create(
    data: NewJob,
    dependsOn: readonly string[] = [],
  ): Promise<CreateJobResult> {
    if (!this.txClient) {
      return this.transaction((store) => store.create(data, dependsOn));
    }

    // job_dependencies is keyed on (job_id, depends_on)
    const parents = [...new Set(dependsOn)];

    return this.withClient(async (client) => {
      if (parents.length > 0) {
        const found = await client.query<{ id: string }>(
          'SELECT id FROM jobs WHERE id = ANY($1::text[])',
          [parents],
        );
        const known = new Set(found.rows.map((row) => row.id));
        const missing = parents.find((dependency) => !known.has(dependency));
        if (missing !== undefined) {
          throw new UnknownDependencyError(data.id, missing);
        }
      }

      const inserted = await client.query<Job>(
        `
        INSERT INTO jobs (id, subject_id, operation_type, status, details, error, created_at, completed_at)
        VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, $8)
        ON CONFLICT ((details->>'idempotency_key')) WHERE ${LIVE_KEY_PREDICATE}
        DO NOTHING
        RETURNING ${JOB_COLUMNS}
        `,
        [
          data.id,
          data.subject_id,
          data.operation_type,
          data.status ?? 'PENDING',
          JSON.stringify(data.details),
          data.error ?? null,
          data.created_at,
          data.completed_at ?? null,
        ],
      );

      if (inserted.rows.length === 0) {
        const key = data.details.idempotency_key;
        const existing = key
          ? await this.findLiveByIdempotencyKey(key)
          : null;
        if (!existing) {
          throw new JobInsertFailedError(data.id);
        }
        return { job: existing, created: false };
      }

      for (const dependency of parents) {
        await client.query(
          'INSERT INTO job_dependencies (job_id, depends_on) VALUES ($1, $2)',
          [data.id, dependency],
        );
      }

      return { job: inserted.rows[0], created: true };
    });
  }

  async get(id: string): Promise<Job | null> {
    return this.withClient(async (client) => {
      const result = await client.query<Job>(
        `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`,
        [id],
      );
      return result.rows[0] ?? null;
    });
  }

  async findLiveByIdempotencyKey(key: string): Promise<Job | null> {
    return this.withClient(async (client) => {
      const result = await client.query<Job>(
        `
        SELECT ${JOB_COLUMNS}
        FROM jobs
        WHERE details->>'idempotency_key' = $1
          AND status NOT IN ('CANCELLED', 'DEAD_LETTER')
        LIMIT 1
        `,
        [key],
      );
      return result.rows[0] ?? null;
    });
  }

  async getDependencies(id: string): Promise<string[]> {
    return this.withClient(async (client) => {
      const result = await client.query<{ depends_on: string }>(
        `
        SELECT depends_on
        FROM job_dependencies
        WHERE job_id = $1
        ORDER BY created_at ASC, depends_on ASC
        `,
        [id],
      );
      return result.rows.map((row) => row.depends_on);
    });
  }

  async listPending(options: ListPendingOptions): Promise<Job[]> {
    if (options.limit <= 0 || options.operationTypes.length === 0) {
      return [];
    }

    return this.withClient(async (client) => {
      const result = await client.query<Job>(
        `
        SELECT ${JOB_COLUMNS}
        FROM jobs j
        WHERE j.status = 'PENDING'
          AND j.operation_type = ANY($1::text[])
          AND (
            j.details->>'retry_after' IS NULL
            OR (j.details->>'retry_after')::timestamptz <= $2
          )
          AND NOT EXISTS (
            SELECT 1
            FROM job_dependencies d
            JOIN jobs parent ON parent.id = d.depends_on
            WHERE d.job_id = j.id AND parent.status <> 'COMPLETED'
          )
        ORDER BY j.created_at ASC
        LIMIT $3
        `,
        [options.operationTypes, options.now, options.limit],
      );
      return result.rows;
    });
  }

  async claim(id: string): Promise<Job | null> {
    return this.withClient(async (client) => {
      const result = await client.query<Job>(
        `
        UPDATE jobs
        SET status = 'PROCESSING',
            details = details || $2::jsonb
        WHERE id = $1 AND status = 'PENDING'
        RETURNING ${JOB_COLUMNS}
        `,
        [id, JSON.stringify({ claimed_at: new Date().toISOString() })],
      );
      return result.rows[0] ?? null;
    });
  }

  async transition(id: string, change: JobTransition): Promise<Job | null> {
    const params: unknown[] = [id, change.to];
    const assignments = ['status = $2'];

    if (change.error !== undefined) {
      params.push(change.error);
      assignments.push(`error = $${params.length}`);
    }
    if (change.completedAt !== undefined) {
      params.push(change.completedAt);
      assignments.push(`completed_at = $${params.length}`);
    }
    if (change.details) {
      params.push(JSON.stringify(change.details));
      assignments.push(`details = details || $${params.length}::jsonb`);
    }
    params.push(change.from);

    return this.withClient(async (client) => {
      try {
        const result = await client.query<Job>(
          `
          UPDATE jobs
          SET ${assignments.join(', ')}
          WHERE id = $1 AND status = ANY($${params.length}::text[])
          RETURNING ${JOB_COLUMNS}
          `,
          params,
        );
        return result.rows[0] ?? null;
      } catch (error) {
        // a revived job whose key another live job took in the meantime
        if (isUniqueViolation(error)) {
          throw new IdempotencyKeyConflictError(id);
        }
        throw error;
      }
    });
  }

  async listStale(options: {
    claimedBefore: Date;
    limit: number;
  }): Promise<Job[]> {
    return this.withClient(async (client) => {
      const result = await client.query<Job>(
        `
        SELECT ${JOB_COLUMNS}
        FROM jobs
        WHERE status = 'PROCESSING'
          AND (details->>'claimed_at')::timestamptz < $1
        ORDER BY (details->>'claimed_at')::timestamptz ASC
        LIMIT $2
        `,
        [options.claimedBefore, options.limit],
      );
      return result.rows;
    });
  }

  async find(filter: JobFilter): Promise<Job[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.status !== undefined) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.operationType !== undefined) {
      params.push(filter.operationType);
      conditions.push(`operation_type = $${params.length}`);
    }
    if (filter.operationTypePrefix !== undefined) {
      params.push(`${filter.operationTypePrefix}%`);
      conditions.push(`operation_type LIKE $${params.length}`);
    }
    if (filter.subjectId !== undefined) {
      params.push(filter.subjectId);
      conditions.push(`subject_id = $${params.length}`);
    }

    const whereClause =
      conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const orderBy =
      filter.status === 'DEAD_LETTER'
        ? 'completed_at DESC NULLS LAST'
        : 'created_at DESC';

    params.push(filter.limit);

    return this.withClient(async (client) => {
      const result = await client.query<Job>(
        `
        SELECT ${JOB_COLUMNS}
        FROM jobs
        ${whereClause}
        ORDER BY ${orderBy}
        LIMIT $${params.length}
        `,
        params,
      );
      return result.rows;
    });
  }

  async countByStatusAndType(): Promise<StatusTypeCount[]> {
    return this.withClient(async (client) => {
      const result = await client.query<StatusTypeCount>(
        `
        SELECT status, operation_type, COUNT(*)::int AS count
        FROM jobs
        GROUP BY status, operation_type
        `,
      );
      return result.rows;
    });
  }

  async deleteCompletedBefore(cutoff: Date): Promise<number> {
    return this.withClient(async (client) => {
      const result = await client.query(
        "DELETE FROM jobs WHERE status = 'COMPLETED' AND completed_at < $1",
        [cutoff],
      );
      return result.rowCount ?? 0;
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.withClient(async (client) => {
      const result = await client.query('DELETE FROM jobs WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async transaction<T>(fn: (store: JobStore) => Promise<T>): Promise<T> {
    if (this.txClient) {
      return fn(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PgJobStore(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn(
          { service: 'queue', error: rollbackError },
          'rollback failed',
        );
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    if (!this.txClient) {
      await this.pool.end();
    }
  }

  private async withClient<T>(
    fn: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    if (this.txClient) {
      return fn(this.txClient);
    }

    const client = await this.pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }
}
