import type { SinkConfig } from '../../config/config';
import { PostgresTableSink } from './postgres';
import { SqliteTableSink } from './sqlite';
import type { TableSink } from './TableSink';

/**
 * Fabrique de destination : une nouvelle connexion par chargement.
 */
export function sinkOpener(config: SinkConfig): () => TableSink {
  switch (config.kind) {
    case 'sqlite':
      return () => new SqliteTableSink(config.path);
    case 'postgres':
      return () => PostgresTableSink.fromConnectionString(config.connectionString);
  }
}
