import type { Sequelize } from 'sequelize';
import { RecordFileError, logger as defaultLogger, type Layout, type Logger, type Record } from '@fixedrec/core';
import type { RecordWriter } from '@fixedrec/export';
import { columnsFor, defineRecordTableModel, tableNameFor } from './models/RecordTableModel.js';
import type { ColumnMapping, RecordTableModel } from './models/RecordTableModel.js';
import { toRow } from './mappers/RowMapper.js';
import type { RecordRow } from './mappers/RowMapper.js';

export interface SequelizeWriterOptions {
  /** Value of the `tag` column, usually the input file name. Default: `''`. */
  readonly tag?: string;
  /** Rows buffered before `write()` flushes on its own. Default: 500. */
  readonly batchSize?: number;
  /** Default: the shared `fixedrec` pino logger. */
  readonly logger?: Logger;
}

interface RecordTable {
  readonly model: RecordTableModel;
  readonly columns: readonly ColumnMapping[];
  rows: RecordRow[];
}

/**
 * Persists decoded records through Sequelize v6, one table per record type.
 *
 * Call `initialize(layout)` to define and sync the tables, then `write()` each
 * record. Values are copied when written, so the reader's shared templates can
 * be passed in directly. Buffered rows are inserted by `flush()`, in one
 * transaction, and on `close()`.
 *
 * Each table has a leading `tag` column followed by one column per field:
 * INTEGER for `integer` fields, REAL for `decimal` and `overpunch` fields,
 * TEXT otherwise.
 */
export class SequelizeWriter implements RecordWriter {
  private readonly sequelize: Sequelize;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly tables = new Map<string, RecordTable>();
  private pending = 0;
  private _tag: string;

  constructor(sequelize: Sequelize, options?: SequelizeWriterOptions) {
    this.sequelize = sequelize;
    this._tag = options?.tag ?? '';
    this.batchSize = options?.batchSize ?? 500;
    this.logger = options?.logger ?? defaultLogger;
  }

  get tag(): string {
    return this._tag;
  }

  /** Applies to rows written from now on. */
  set tag(tag: string) {
    this._tag = tag;
  }

  /**
   * Define one model per record type of `layout` and create the missing tables.
   * Rows already buffered for a record type are kept.
   */
  async initialize(layout: Layout): Promise<void> {
    for (const record of layout) {
      const columns = columnsFor(record);
      const model = defineRecordTableModel(this.sequelize, record, columns);
      await model.sync();
      this.tables.set(record.name, { model, columns, rows: this.tables.get(record.name)?.rows ?? [] });
      this.logger.debug({ table: tableNameFor(record.name), columns: columns.length }, 'record table ready');
    }
  }

  async write(record: Record): Promise<void> {
    const table = this.tables.get(record.name);
    if (!table) {
      throw new RecordFileError('UNKNOWN_RECORD_TYPE', `No table for record type '${record.name}'; call initialize() with its layout`, {
        metadata: { record: record.name },
      });
    }

    table.rows.push(toRow(this._tag, table.columns, record));
    this.pending++;

    if (this.pending >= this.batchSize) {
      await this.flush();
    }
  }

  /**
   * Insert every buffered row in one transaction.
   *
   * The buffers are cleared only once the transaction commits; after a failure
   * the rows stay buffered for the next `flush()` or `close()`.
   */
  async flush(): Promise<void> {
    if (this.pending === 0) return;

    const batches = [...this.tables.values()].filter((t) => t.rows.length > 0).map((t) => ({ table: t, rows: [...t.rows] }));
    const count = this.pending;

    await this.sequelize.transaction(async (transaction) => {
      for (const { table, rows } of batches) {
        await table.model.bulkCreate(rows, { transaction });
      }
    });

    for (const { table, rows } of batches) {
      table.rows = table.rows.slice(rows.length);
    }
    this.pending -= count;

    this.logger.debug({ rows: count }, 'records inserted');
  }

  /** Flush the remaining rows. The Sequelize instance stays open. */
  async close(): Promise<void> {
    await this.flush();
  }
}
