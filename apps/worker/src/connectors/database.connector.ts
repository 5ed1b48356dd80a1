import type { Pool, PoolClient } from 'pg';
import { logger } from '@pipeline/shared';
import { InvalidIdentifierError, errorMessage } from '../errors';
import { BaseConnector } from './base.connector';
import type { ConnectorOptions } from './base.connector';
import type { DeliveryTracker } from './delivery-tracker';
import { SKIPPED_ALREADY_DELIVERED, deliveryResult } from './delivery.types';
import type { DeliveryItem, DeliveryResult } from './delivery.types';

export type DatabaseConnectorConfig = {
  table: string;
  /** data field -> column */
  columnMapping: Record<string, string>;
  upsertKey?: string;
  enableUpsert?: boolean;
  /** Column receiving `{ data, metadata }` as JSON; null to skip. */
  jsonColumn?: string | null;
  createdAtColumn?: string;
  updatedAtColumn?: string;
};

type ResolvedConfig = Required<DatabaseConnectorConfig>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TABLE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

function assertIdentifier(name: string, pattern: RegExp = IDENTIFIER): string {
  if (!pattern.test(name)) {
    throw new InvalidIdentifierError(name);
  }
  return name;
}

type Row = Array<[column: string, value: unknown]>;

/**
 * Upserts delivered data into a table of an external PostgreSQL database.
 * Table and column names come from configuration and are validated once, at
 * construction; values always travel as parameters.
 */
export class DatabaseConnector extends BaseConnector {
  readonly connectorType = 'DATABASE';
  private readonly config: ResolvedConfig;

  constructor(
    config: DatabaseConnectorConfig,
    private readonly pool: Pool,
    deps: {
      tracker?: DeliveryTracker | null;
      options?: Partial<ConnectorOptions>;
    } = {},
  ) {
    super(deps.options, deps.tracker ?? null);
    this.config = {
      table: assertIdentifier(config.table, TABLE),
      columnMapping: Object.fromEntries(
        Object.entries(config.columnMapping).map(([field, column]) => [
          field,
          assertIdentifier(column),
        ]),
      ),
      upsertKey: assertIdentifier(config.upsertKey ?? 'subject_id'),
      enableUpsert: config.enableUpsert ?? true,
      jsonColumn:
        config.jsonColumn === undefined
          ? 'raw_data'
          : config.jsonColumn && assertIdentifier(config.jsonColumn),
      createdAtColumn: assertIdentifier(config.createdAtColumn ?? 'created_at'),
      updatedAtColumn: assertIdentifier(config.updatedAtColumn ?? 'updated_at'),
    };
  }

  async deliver(
    subjectId: string,
    data: Record<string, unknown>,
    metadata: Record<string, unknown> = {},
  ): Promise<DeliveryResult> {
    const started = Date.now();
    const client = await this.pool.connect();
    try {
      await this.write(
        client,
        this.buildRow(subjectId, data, metadata, new Date()),
      );
      return this.delivered(started);
    } catch (error) {
      logger.error(
        {
          service: 'connector',
          connector_type: this.connectorType,
          subject_id: subjectId,
          table: this.config.table,
          error,
        },
        'database write failed',
      );
      return deliveryResult({
        success: false,
        error: errorMessage(error),
        duration_ms: Date.now() - started,
      });
    } finally {
      client.release();
    }
  }

  /** Every row not yet delivered is written in one transaction. */
  async deliverBatch(items: readonly DeliveryItem[]): Promise<DeliveryResult[]> {
    const pending = new Set<DeliveryItem>();
    for (const item of items) {
      if (await this.shouldDeliver(item.subjectId)) {
        pending.add(item);
      }
    }

    const skipped = (): DeliveryResult =>
      deliveryResult({
        success: true,
        response_data: { ...SKIPPED_ALREADY_DELIVERED },
      });
    if (pending.size === 0) {
      return items.map(skipped);
    }

    const started = Date.now();
    const now = new Date();
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (const item of pending) {
        await this.write(
          client,
          this.buildRow(item.subjectId, item.data, item.metadata ?? {}, now),
        );
      }
      await client.query('COMMIT');
      return items.map((item) =>
        pending.has(item) ? this.delivered(started) : skipped(),
      );
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn(
          { service: 'connector', error: rollbackError },
          'rollback failed',
        );
      });
      logger.error(
        {
          service: 'connector',
          connector_type: this.connectorType,
          table: this.config.table,
          size: pending.size,
          error,
        },
        'database batch write failed',
      );
      return items.map(() =>
        deliveryResult({ success: false, error: errorMessage(error) }),
      );
    } finally {
      client.release();
    }
  }

  buildRow(
    subjectId: string,
    data: Record<string, unknown>,
    metadata: Record<string, unknown>,
    now: Date,
  ): Row {
    const row: Row = [[this.config.upsertKey, subjectId]];
    for (const [field, column] of Object.entries(this.config.columnMapping)) {
      if (column !== this.config.upsertKey && field in data) {
        row.push([column, data[field]]);
      }
    }
    if (this.config.jsonColumn) {
      row.push([this.config.jsonColumn, JSON.stringify({ data, metadata })]);
    }
    row.push([this.config.createdAtColumn, now]);
    row.push([this.config.updatedAtColumn, now]);
    return row;
  }

  buildStatement(columns: readonly string[]): string {
    const placeholders = columns.map((_, index) => `$${index + 1}`).join(', ');
    const insert = `INSERT INTO ${this.config.table} (${columns.join(', ')}) VALUES (${placeholders})`;
    if (!this.config.enableUpsert) {
      return insert;
    }

    const updates = columns
      .filter(
        (column) =>
          column !== this.config.upsertKey &&
          column !== this.config.createdAtColumn,
      )
      .map((column) => `${column} = EXCLUDED.${column}`)
      .join(', ');
    return `${insert} ON CONFLICT (${this.config.upsertKey}) DO UPDATE SET ${updates}`;
  }

  private async write(client: PoolClient, row: Row): Promise<void> {
    await client.query(
      this.buildStatement(row.map(([column]) => column)),
      row.map(([, value]) => value),
    );
  }

  private delivered(started: number): DeliveryResult {
    return deliveryResult({
      success: true,
      response_data: {
        table: this.config.table,
        operation: this.config.enableUpsert ? 'upsert' : 'insert',
      },
      delivered_at: new Date().toISOString(),
      duration_ms: Date.now() - started,
    });
  }
}
