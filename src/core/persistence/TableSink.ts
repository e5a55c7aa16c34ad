export const COLUMN_TYPES = ['Text', 'DateTime', 'Boolean', 'BigInteger', 'Integer', 'Float'] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export type SqlValue = string | number | boolean | null;

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
}

export interface ReplaceTableRequest {
  table: string;
  columns: readonly ColumnDefinition[];
  rows: readonly (readonly SqlValue[])[];
  /** Nombre maximal de lignes par INSERT multi-lignes. */
  batchSize: number;
  /** Colonne indexée après création (ex. la colonne de numéro de ligne). */
  indexColumn?: string;
}

/**
 * Destination relationnelle : remplacement complet d'une table.
 * Les lecteurs ne doivent jamais voir une table à moitié écrite.
 */
export interface TableSink {
  /** @returns nombre de lignes écrites */
  replaceTable(request: ReplaceTableRequest): Promise<number>;
  /** Libère la connexion. */
  close(): Promise<void>;
}
