import { SinkError, errorMessage } from '../core/errors';
import { type Logger, consoleLogger, formatElapsed } from '../core/utils/Logger';
import type { ColumnDefinition, ColumnType, SqlValue, TableSink } from '../core/persistence/TableSink';
import { type JsonValue, type Table, classify } from './Table';

export const INDEX_COLUMN = 'index';
export const DEFAULT_BATCH_SIZE = 1000;

export function toSqlValue(value: JsonValue): SqlValue {
  const cell = classify(value);
  switch (cell.kind) {
    case 'null':
      return null;
    case 'scalar':
      return cell.value;
    case 'object':
    case 'array':
      return JSON.stringify(cell.value);
  }
}

/** Type déduit des valeurs non nulles ; `Text` par défaut. */
export function inferColumnType(values: readonly SqlValue[]): ColumnType {
  const present = values.filter((v): v is string | number | boolean => v !== null);
  if (present.length === 0) return 'Text';
  if (present.every((v) => typeof v === 'boolean')) return 'Boolean';
  if (present.every((v) => typeof v === 'number' && Number.isInteger(v))) return 'BigInteger';
  if (present.every((v) => typeof v === 'number')) return 'Float';
  return 'Text';
}

export interface LoaderOptions {
  batchSize?: number;
  logger?: Logger;
}

/**
 * Charge la table finale en remplaçant entièrement la table de destination.
 * La destination est ouverte pour ce seul chargement et refermée quoi qu'il arrive.
 */
export class Loader {
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly openSink: () => TableSink | Promise<TableSink>,
    options: LoaderOptions = {},
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * @param columnTypes types imposés par nom de colonne ; les autres sont déduits
   * @returns nombre de lignes écrites
   */
  public async load(table: Table, tableName: string, columnTypes: Readonly<Record<string, ColumnType>> = {}): Promise<number> {
    const values = table.columns.map((c) => c.values.map(toSqlValue));
    const columns: ColumnDefinition[] = [
      { name: INDEX_COLUMN, type: 'BigInteger' },
      ...table.names.map((name, i) => ({ name, type: columnTypes[name] ?? inferColumnType(values[i]) })),
    ];
    const rows: SqlValue[][] = [];
    for (let r = 0; r < table.rowCount; r++) {
      rows.push([r, ...values.map((column) => column[r])]);
    }

    this.logger('info', `Envoi vers la base (${rows.length} lignes, ${columns.length} colonnes)...`);
    const started = Date.now();

    const sink = await this.openSink();
    let written: number;
    try {
      written = await sink.replaceTable({
        table: tableName,
        columns,
        rows,
        batchSize: this.batchSize,
        indexColumn: INDEX_COLUMN,
      });
    } catch (err) {
      const failure = err instanceof SinkError ? err : new SinkError(tableName, errorMessage(err), err);
      await this.closeAfterFailure(sink, tableName);
      throw failure;
    }

    try {
      await sink.close();
    } catch (err) {
      throw new SinkError(tableName, `fermeture impossible: ${errorMessage(err)}`, err);
    }
    this.logger('info', `Temps écoulé ${formatElapsed(Date.now() - started)}`);
    return written;
  }

  // L'erreur de chargement reste celle remontée ; l'échec de fermeture est seulement journalisé
  private async closeAfterFailure(sink: TableSink, tableName: string): Promise<void> {
    try {
      await sink.close();
    } catch (err) {
      this.logger('warn', `Fermeture de la destination impossible: ${errorMessage(err)}`, { table: tableName });
    }
  }
}
