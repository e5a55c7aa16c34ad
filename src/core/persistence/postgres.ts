import { Pool } from 'pg';

import { SinkError, errorMessage } from '../errors';
import { batches, createIndexSql, createTableSql, insertSql, quoteIdentifier, rowsPerStatement, validateRequest } from './sqlDialect';
import type { ReplaceTableRequest, TableSink } from './TableSink';

const PG_MAX_PARAMETERS = 65535;
// Au-delà, Postgres tronque l'identifiant sans erreur
const PG_MAX_IDENTIFIER_BYTES = 63;

// Adaptateurs minimaux, compatibles avec pg.Pool / pg.PoolClient
export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(err?: Error | boolean): void;
}

export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

/**
 * Destination PostgreSQL.
 * Le remplacement est exécuté entre BEGIN et COMMIT ; ROLLBACK en cas d'échec.
 */
export class PostgresTableSink implements TableSink {
  constructor(private readonly pool: PgPoolLike) {}

  public static fromConnectionString(connectionString: string): PostgresTableSink {
    const pool = new Pool({ connectionString });
    return new PostgresTableSink({
      connect: async () => {
        const client = await pool.connect();
        return {
          query: (text: string, values?: unknown[]) => client.query(text, values),
          release: (err?: Error | boolean) => client.release(err),
        };
      },
      end: () => pool.end(),
    });
  }

  public async replaceTable(request: ReplaceTableRequest): Promise<number> {
    const problem = validateRequest(request);
    if (problem) throw new SinkError(request.table, problem);

    const { table, columns, rows } = request;
    const tooLong = [table, ...columns.map((c) => c.name)].filter((name) => Buffer.byteLength(name, 'utf8') > PG_MAX_IDENTIFIER_BYTES);
    if (tooLong.length > 0) {
      throw new SinkError(table, `identifiants de plus de ${PG_MAX_IDENTIFIER_BYTES} octets: ${tooLong.join(', ')}`);
    }

    let client: PgClientLike;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new SinkError(table, `connexion impossible: ${errorMessage(err)}`, err);
    }

    const perStatement = rowsPerStatement(request.batchSize, columns.length, PG_MAX_PARAMETERS);
    // Client dans un état inconnu après un ROLLBACK en échec : détruit au lieu d'être rendu au pool
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      await client.query(`DROP TABLE IF EXISTS ${quoteIdentifier(table)}`);
      await client.query(createTableSql('postgres', table, columns));
      if (request.indexColumn) {
        await client.query(createIndexSql(table, request.indexColumn));
      }
      let written = 0;
      for (const batch of batches(rows, perStatement)) {
        await client.query(insertSql('postgres', table, columns, batch.length), batch.flat());
        written += batch.length;
      }
      await client.query('COMMIT');
      return written;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        broken = rollbackErr instanceof Error ? rollbackErr : new Error(errorMessage(rollbackErr));
        throw new SinkError(table, `${errorMessage(err)} (ROLLBACK: ${errorMessage(rollbackErr)})`, err);
      }
      throw new SinkError(table, errorMessage(err), err);
    } finally {
      client.release(broken);
    }
  }

  public async close(): Promise<void> {
    await this.pool.end();
  }
}
