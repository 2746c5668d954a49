/**
 * SQLite source adapter.
 * Reads table structure through PRAGMA table_info / foreign_key_list on a
 * read-only connection, plus a few rows for sample values.
 */

import Database from 'better-sqlite3';
import type { ExtractOptions, ISourceAdapter } from './ISourceAdapter.js';
import type { SourceSpec, SqliteSourceSpec } from '../types/api.js';
import type { RawFieldDescriptor } from '../types/models.js';
import {
  SourceMalformedError,
  SourceUnreachableError,
  ValidationError,
  errorMessage,
} from '../errors.js';

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: unknown;
  pk: number;
}

interface ForeignKeyRow {
  id: number;
  seq: number;
  table: string;
  from: string;
  /** Null when the constraint names no column and points at the target's primary key. */
  to: string | null;
}

export class SqliteSourceAdapter implements ISourceAdapter {
  readonly kind = 'sqlite';
  readonly sourceType = 'database';

  constructor(private readonly sampleRows: number = 5) {}

  sourceId(spec: SourceSpec): string {
    const sqlite = this.narrow(spec);
    return sqlite.sourceId?.trim() || sqlite.path;
  }

  async listContainers(spec: SourceSpec, options: ExtractOptions): Promise<string[]> {
    const sqlite = this.narrow(spec);
    return this.withDatabase(sqlite, options, (db) =>
      db
        .prepare<[], { name: string }>(
          `SELECT name FROM sqlite_master
           WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%'
           ORDER BY name`
        )
        .all()
        .map((row) => row.name)
    );
  }

  async extract(
    spec: SourceSpec,
    container: string,
    options: ExtractOptions
  ): Promise<RawFieldDescriptor[]> {
    const sqlite = this.narrow(spec);

    return this.withDatabase(sqlite, options, (db) => {
      const columns = tableInfo(db, container);
      if (columns.length === 0) {
        throw new SourceMalformedError(`Table "${container}" has no columns or does not exist`, {
          container,
        });
      }

      const foreignKeys = new Map<string, { container: string; field: string }>();
      for (const fk of foreignKeyList(db, container)) {
        const field = fk.to ?? primaryKeyOf(db, fk.table);
        if (field) {
          foreignKeys.set(fk.from, { container: fk.table, field });
        }
      }

      const rows = db
        .prepare<[number], Record<string, unknown>>(
          `SELECT * FROM ${quoteIdentifier(container)} LIMIT ?`
        )
        .all(this.sampleRows);

      return columns.map((column): RawFieldDescriptor => {
        const target = foreignKeys.get(column.name);
        const isPrimaryKey = column.pk > 0;
        return {
          name: column.name,
          typeHint: column.type || undefined,
          // SQLite reports notnull=0 for INTEGER PRIMARY KEY, which can never hold NULL
          nullable: column.notnull === 0 && !isPrimaryKey,
          isPrimaryKey,
          isForeignKey: target !== undefined,
          fkTarget: target,
          samples: rows.map((row) => row[column.name]),
        };
      });
    });
  }

  // ── Private ──

  private narrow(spec: SourceSpec): SqliteSourceSpec {
    if (spec.kind !== 'sqlite') {
      throw new ValidationError(`SqliteSourceAdapter cannot crawl "${spec.kind}" sources`);
    }
    return spec;
  }

  private withDatabase<T>(
    spec: SqliteSourceSpec,
    options: ExtractOptions,
    work: (db: Database.Database) => T
  ): T {
    if (options.signal.aborted) {
      throw new SourceUnreachableError('Crawl aborted before opening the database');
    }

    let db: Database.Database;
    try {
      db = new Database(spec.path, {
        readonly: true,
        fileMustExist: true,
        timeout: options.timeoutMs,
      });
    } catch (err) {
      throw new SourceUnreachableError(`Cannot open SQLite database: ${errorMessage(err)}`, {
        path: spec.path,
      });
    }

    try {
      return work(db);
    } catch (err) {
      if (err instanceof SourceMalformedError) throw err;
      throw new SourceMalformedError(`SQLite query failed: ${errorMessage(err)}`, {
        path: spec.path,
      });
    } finally {
      db.close();
    }
  }
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function tableInfo(db: Database.Database, table: string): TableInfoRow[] {
  return db.prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdentifier(table)})`).all();
}

function foreignKeyList(db: Database.Database, table: string): ForeignKeyRow[] {
  return db
    .prepare<[], ForeignKeyRow>(`PRAGMA foreign_key_list(${quoteIdentifier(table)})`)
    .all()
    .filter((row) => row.seq === 0);
}

function primaryKeyOf(db: Database.Database, table: string): string | null {
  const pk = tableInfo(db, table).find((column) => column.pk === 1);
  return pk ? pk.name : null;
}
