import { access, appendFile, mkdir } from 'fs/promises';
import path from 'path';
import { logger } from '@pipeline/shared';
import { errorMessage } from '../errors';
import { BaseConnector } from './base.connector';
import type { ConnectorOptions } from './base.connector';
import type { DeliveryTracker } from './delivery-tracker';
import { deliveryResult } from './delivery.types';
import type { DeliveryItem, DeliveryResult } from './delivery.types';

export type CsvConnectorConfig = {
  outputDir: string;
  /** `{date}` is replaced with the UTC date as yyyymmdd. */
  filenameTemplate?: string;
  columns: readonly string[];
  /** dot path into the data (or `subject_id`) -> column */
  fieldMapping: Record<string, string>;
  delimiter?: string;
  includeHeader?: boolean;
  rotateDaily?: boolean;
  maxRowsPerFile?: number;
};

type CsvRow = Record<string, unknown>;

export function extractPath(data: Record<string, unknown>, dotPath: string): unknown {
  let value: unknown = data;
  for (const part of dotPath.split('.')) {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return undefined;
    }
    value = Object.getOwnPropertyDescriptor(value, part)?.value;
  }
  return value;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/** RFC 4180: quote when the cell holds the delimiter, a quote or a line break. */
export function formatCsvLine(
  cells: readonly unknown[],
  delimiter = ',',
): string {
  return cells
    .map((cell) => {
      const text = cellText(cell);
      return text.includes(delimiter) || /["\r\n]/.test(text)
        ? `"${text.replace(/"/g, '""')}"`
        : text;
    })
    .join(delimiter);
}

function utcDate(at: Date): string {
  return at.toISOString().slice(0, 10).replace(/-/g, '');
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Appends one row per delivery to a CSV file under `outputDir`. Files rotate
 * daily and, with `maxRowsPerFile`, into numbered parts (`_part2`, ...).
 * Writes are serialised so a header is written exactly once per file.
 */
export class CsvConnector extends BaseConnector {
  readonly connectorType = 'CSV';
  private currentDate: string | null = null;
  private currentPart = 1;
  private rowsInFile = 0;
  private writes: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly config: CsvConnectorConfig,
    deps: {
      tracker?: DeliveryTracker | null;
      options?: Partial<ConnectorOptions>;
    } = {},
  ) {
    super(deps.options, deps.tracker ?? null);
  }

  async deliver(
    subjectId: string,
    data: Record<string, unknown>,
    metadata?: Record<string, unknown>,
  ): Promise<DeliveryResult> {
    const [result] = await this.writeRows([{ subjectId, data, metadata }]);
    return result;
  }

  /** One append per file the rows land in. */
  async deliverBatch(items: readonly DeliveryItem[]): Promise<DeliveryResult[]> {
    return this.writeRows(items);
  }

  toRow(subjectId: string, data: Record<string, unknown>): CsvRow {
    const row: CsvRow = {};
    for (const [fieldPath, column] of Object.entries(this.config.fieldMapping)) {
      if (!this.config.columns.includes(column)) {
        continue;
      }
      row[column] =
        fieldPath === 'subject_id' ? subjectId : extractPath(data, fieldPath);
    }
    return row;
  }

  private writeRows(items: readonly DeliveryItem[]): Promise<DeliveryResult[]> {
    const run = this.writes.then(() => this.appendRows(items));
    this.writes = run.catch(() => undefined);
    return run;
  }

  /** Rows past `maxRowsPerFile` continue in the next part. */
  private async appendRows(
    items: readonly DeliveryItem[],
  ): Promise<DeliveryResult[]> {
    const started = Date.now();
    const results: DeliveryResult[] = [];
    try {
      await mkdir(this.config.outputDir, { recursive: true });

      let remaining = items;
      while (remaining.length > 0) {
        const file = this.currentFile(new Date());
        const room =
          this.config.maxRowsPerFile === undefined
            ? remaining.length
            : Math.max(1, this.config.maxRowsPerFile - this.rowsInFile);
        const chunk = remaining.slice(0, room);
        remaining = remaining.slice(room);

        await this.appendChunk(file, chunk);
        this.rowsInFile += chunk.length;
        for (let i = 0; i < chunk.length; i++) {
          results.push(
            deliveryResult({
              success: true,
              response_data: { file, row_count: this.rowsInFile },
              delivered_at: new Date().toISOString(),
              duration_ms: Date.now() - started,
            }),
          );
        }
      }
      return results;
    } catch (error) {
      logger.error(
        {
          service: 'connector',
          connector_type: this.connectorType,
          size: items.length - results.length,
          error,
        },
        'csv export failed',
      );
      return [
        ...results,
        ...items.slice(results.length).map(() =>
          deliveryResult({
            success: false,
            error: errorMessage(error),
            duration_ms: Date.now() - started,
          }),
        ),
      ];
    }
  }

  private async appendChunk(
    file: string,
    items: readonly DeliveryItem[],
  ): Promise<void> {
    const delimiter = this.config.delimiter ?? ',';
    const lines: string[] = [];
    if ((this.config.includeHeader ?? true) && !(await exists(file))) {
      lines.push(formatCsvLine(this.config.columns, delimiter));
    }
    for (const item of items) {
      const row = this.toRow(item.subjectId, item.data);
      lines.push(
        formatCsvLine(
          this.config.columns.map((column) => row[column]),
          delimiter,
        ),
      );
    }
    await appendFile(file, `${lines.join('\r\n')}\r\n`, 'utf8');
  }

  private currentFile(now: Date): string {
    const date = utcDate(now);
    const rollover =
      (this.config.rotateDaily ?? true) && date !== this.currentDate;
    if (this.currentDate === null || rollover) {
      this.currentDate = date;
      this.currentPart = 1;
      this.rowsInFile = 0;
    } else if (
      this.config.maxRowsPerFile !== undefined &&
      this.rowsInFile >= this.config.maxRowsPerFile
    ) {
      this.currentPart++;
      this.rowsInFile = 0;
    }

    const base = (this.config.filenameTemplate ?? 'export_{date}.csv').replace(
      '{date}',
      this.currentDate,
    );
    const name =
      this.currentPart === 1
        ? base
        : base.endsWith('.csv')
          ? `${base.slice(0, -'.csv'.length)}_part${this.currentPart}.csv`
          : `${base}_part${this.currentPart}`;
    return path.join(this.config.outputDir, name);
  }
}
