import { ConfigurationError, MissingColumnError } from '../core/errors';
import { type Column, Table } from './Table';

export interface Projection {
  /** Colonnes à conserver, dans l'ordre de sortie. */
  select: readonly string[];
  /** Libellés lisibles pour une partie des colonnes retenues. */
  rename: Readonly<Record<string, string>>;
}

/**
 * Sélectionne et renomme les colonnes finales.
 * Une colonne demandée mais absente est une erreur de configuration.
 */
export function project(table: Table, projection: Projection): Table {
  const selected = new Set(projection.select);
  for (const key of Object.keys(projection.rename)) {
    if (!selected.has(key)) {
      throw new ConfigurationError(`Libellé défini pour '${key}', qui ne fait pas partie des colonnes retenues`);
    }
  }

  const columns: Column[] = projection.select.map((name) => {
    const column = table.column(name);
    if (!column) throw new MissingColumnError(name);
    const label = projection.rename[name];
    return label === undefined ? column : { path: [label], values: column.values };
  });

  return new Table(columns, table.rowCount);
}
