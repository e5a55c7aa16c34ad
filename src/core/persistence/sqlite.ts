// persistence/sqlite.ts
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

import { SinkError, errorMessage } from '../errors';
import { batches, createIndexSql, createTableSql, insertSql, quoteIdentifier, rowsPerStatement, validateRequest } from './sqlDialect';
import type { ReplaceTableRequest, SqlValue, TableSink } from './TableSink';

// SQLITE_MAX_VARIABLE_NUMBER par défaut depuis SQLite 3.32
const SQLITE_MAX_VARIABLES = 32766;

// better-sqlite3 ne lie pas les booléens
function toSqliteValue(value: SqlValue): string | number | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

/**
 * Destination SQLite (fichier ou ':memory:').
 * Le remplacement complet (DROP + CREATE + INSERT) tient dans une seule transaction.
 */
export class SqliteTableSink implements TableSink {
  private db?: Database.Database;

  constructor(private readonly dbPath: string) {}

  private connection(): Database.Database {
    if (!this.db) {
      if (this.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
      }
      const db = new Database(this.dbPath);
      // Petits réglages perf/fiabilité
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      this.db = db;
    }
    return this.db;
  }

  public async replaceTable(request: ReplaceTableRequest): Promise<number> {
    const problem = validateRequest(request);
    if (problem) throw new SinkError(request.table, problem);

    const { table, columns, rows } = request;
    const perStatement = rowsPerStatement(request.batchSize, columns.length, SQLITE_MAX_VARIABLES);

    try {
      const db = this.connection();
      const statements = new Map<number, Database.Statement>();
      const statementFor = (rowCount: number): Database.Statement => {
        let stmt = statements.get(rowCount);
        if (!stmt) {
          stmt = db.prepare(insertSql('sqlite', table, columns, rowCount));
          statements.set(rowCount, stmt);
        }
        return stmt;
      };

      const replace = db.transaction((): number => {
        db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(table)}`);
        db.exec(createTableSql('sqlite', table, columns));
        if (request.indexColumn) {
          db.exec(createIndexSql(table, request.indexColumn));
        }
        let written = 0;
        for (const batch of batches(rows, perStatement)) {
          statementFor(batch.length).run(...batch.flatMap((row) => row.map(toSqliteValue)));
          written += batch.length;
        }
        return written;
      });

      return replace();
    } catch (err) {
      throw new SinkError(table, errorMessage(err), err);
    }
  }

  public async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = undefined;
    }
  }
}
